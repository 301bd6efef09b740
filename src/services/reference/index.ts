export { fetchWebsiteDesign, summarizeWebsiteDesign } from './website.js';
export {
  collectUploadedImages,
  decodeFileData,
  extractPdfText,
  processReferenceFiles,
  sanitizeFilename,
} from './files.js';
export type { ReferenceFile } from './files.js';
export { listTemplates, loadTemplate, withProfilePlaceholders } from './templates.js';
