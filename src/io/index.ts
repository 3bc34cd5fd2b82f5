export { writeHtmlFile, contentHash } from './HtmlFileWriter.js';
export type { WriteHtmlOptions, WriteHtmlResult } from './types.js';
