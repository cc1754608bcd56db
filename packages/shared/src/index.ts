export * from "./master-model";
export { springPositionKey, formatQuantityPerBogie, isoDatePart } from "./utils";
