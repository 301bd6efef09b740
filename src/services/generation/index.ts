export { generateWebsite } from './generate.js';
export { updateWebsite, UPDATE_INPUT_REQUIRED } from './update.js';
export type { GenerateWebsiteRequest, UpdateWebsiteRequest, WebsiteResult } from './types.js';
