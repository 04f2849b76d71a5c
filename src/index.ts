export * from './types/door.ts';
export * from './types/table.ts';
export * from './lib/config.ts';
export * from './lib/errors.ts';
export { normalizeText } from './lib/text.ts';
export * from './lib/tokens.ts';
export { parseDoorType } from './lib/doorType.ts';
export { mergeContinuation } from './lib/continuation.ts';
export { isMultiDoor, splitMultiDoor } from './lib/multiDoor.ts';
export { readSectionFields, resolveSections } from './lib/sectionResolver.ts';
export { isValidDoorRecord } from './lib/validator.ts';
export * from './lib/extraction.ts';
export { postProcessRecords } from './lib/postProcess.ts';
export * from './lib/output.ts';
export { formatReport, summarizeRecords } from './lib/report.ts';
export * from './lib/tableSource.ts';
