export { normalizeLabel } from "./lib/text-normalizer";
export { convertDate, parseSourceTimestamp } from "./lib/date-converter";
export type { TimestampParts } from "./lib/date-converter";
export {
  extractNumericValue,
  findFirstNumber,
  normalizeNumberRun,
  stripApproximation,
} from "./lib/numeric-extractor";
export { CLASSIFICATION_RULES, classifyRecord, findMatchingRule } from "./lib/row-classifier";
export type { ClassificationRule, LedgerMovement, RecordClassification, RuleContext } from "./lib/row-classifier";
export { convertRows, mapSourceRow, toSourceRecord, toTargetRow } from "./lib/record-mapper";
export type { MapOptions } from "./lib/record-mapper";
export { parseSourceCsv } from "./lib/novadax-csv-parser";
export type { ParsedSourceCsv } from "./lib/novadax-csv-parser";
export { serializeTargetCsv } from "./lib/koinly-csv-writer";
export { convertCsvContent, convertFile, createEmptySummary, ROW_KINDS } from "./lib/converter";
export { converterOptionsSchema, resolveConverterOptions } from "./lib/converter-config";
export type { ConverterOptions, ConverterOptionsInput } from "./lib/converter-config";
export { ConversionFileError, getErrorMessage } from "./lib/shared-utils";
export * from "./lib/constants";
export type * from "./types";
export type * from "./presets/types";
