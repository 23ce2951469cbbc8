/**
 * Pipeline modules export
 */

export { scan } from "./scanner";
export { process, processDocument, cancelDocument } from "./processor";
export { resolve, resolveDocument } from "./resolver";
export { score } from "./scorer";
export { report, buildBatchReport, serializeReport } from "./report";
export { write } from "./writer";
export { stats } from "./stats";
