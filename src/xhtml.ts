/**
 * XHTML serialization for DOM subtrees parsed with linkedom.
 *
 * EPUB content documents must be well-formed XML, while the scraped pages are
 * HTML: void elements need self-closing tags and text needs XML escaping.
 */

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

const VOID_ELEMENTS = new Set([
  "area",
  "base",
  "br",
  "col",
  "embed",
  "hr",
  "img",
  "input",
  "link",
  "meta",
  "source",
  "track",
  "wbr",
]);

const XML_NAME = /^[A-Za-z_][\w.-]*(:[A-Za-z_][\w.-]*)?$/;

/** C0 control characters XML 1.0 does not allow, even escaped */
const XML_INVALID_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function isText(node: Node): node is Text {
  return node.nodeType === TEXT_NODE;
}

/**
 * Escape text for use inside an XML element.
 * Control characters XML cannot carry are dropped.
 *
 * @example
 * escapeXml('Fish & <Chips>') // 'Fish &amp; &lt;Chips&gt;'
 */
export function escapeXml(text: string): string {
  return text
    .replace(XML_INVALID_CHARS, "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/**
 * Escape text for use inside a double-quoted XML attribute.
 */
export function escapeAttribute(value: string): string {
  return escapeXml(value).replace(/"/g, "&quot;");
}

/**
 * Serialize a node and its descendants as XHTML.
 * Comments are dropped, as are attributes whose names are not valid XML names.
 */
export function serializeXhtml(node: Node): string {
  if (isText(node)) {
    return escapeXml(node.textContent ?? "");
  }
  if (!isElement(node)) {
    return "";
  }

  const name = node.tagName.toLowerCase();
  const attributes = Array.from(node.attributes)
    .filter((attr) => XML_NAME.test(attr.name))
    .map((attr) => ` ${attr.name}="${escapeAttribute(attr.value)}"`)
    .join("");

  if (VOID_ELEMENTS.has(name)) {
    return `<${name}${attributes}/>`;
  }
  return `<${name}${attributes}>${serializeChildren(node)}</${name}>`;
}

export function serializeChildren(node: Node): string {
  return Array.from(node.childNodes).map(serializeXhtml).join("");
}
