export {
  decodeBase64Strict,
  decodeDataUri,
  DocumentExtractor,
  isPdf,
  locateDocumentLink,
  resolveFilename,
} from "./documentExtractor";
export type { DocumentLink, DocumentRules } from "./documentExtractor";
export { buildResultSet, ResultStatusParser, summarizeResultSet } from "./resultStatusParser";
export type { ResultStatusRules } from "./resultStatusParser";
