export { escapeXml } from "./escape";
export { XmlWriter, type ElementOptions } from "./xml-writer";
export { serialize, serializeNode, serializeToString, type SerializeOptions, type SerializeResult } from "./serializer";
