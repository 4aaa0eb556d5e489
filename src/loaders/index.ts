export { HtmlLoader } from "./HtmlLoader";
export type { HtmlLoaderConfig } from "./HtmlLoader";
export { FileLoader } from "./FileLoader";
export type { FileLoaderConfig } from "./FileLoader";
export {
  htmlToText,
  decodeEntities,
  decodeBody,
  detectCharset,
  truncateContent,
  TRUNCATION_MARKER,
} from "./html";
