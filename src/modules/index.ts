/**
 * Pipeline modules export
 */

export { validate } from "./validator";
export { prepare } from "./preparer";
export { concatenate } from "./concatenator";
export { mergePdfs, mergeRequest } from "./merger";
