export { splitWorkbookStage } from "./splitWorkbook";
export { buildModelStage } from "./buildModel";
export { assemblePayloadsStage } from "./assemblePayloads";
export { writePayloadsStage } from "./writePayloads";
export { dispatchPayloadsStage } from "./dispatchPayloads";
export type { ModelImportInput, ModelImportState } from "./types";
