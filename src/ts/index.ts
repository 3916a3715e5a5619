/**
 * csv2json - CSV lines to JSON lines
 *
 * @module csv2json
 */

export { CSVConverter, splitLines } from "./parser";
export { Field, FieldIterator } from "./field";
export { FieldValue, canonicalizeField, isMaybeNumberString, parseInt64, parseFloat64 } from "./value";
export { Header } from "./header";
export { RowBuilder, encodeValue } from "./row";
export { JSONLineWriter, type JSONLineWriterOptions } from "./writer";
export { scanLines, openInput } from "./scan";
export { CSVError, isCSVError, type CSVErrorType, type CSVErrorCode, type CSVErrorCallback, type CSVErrorLocation } from "./errors";
export type {
  Value,
  ValueType,
  ConverterOptions,
  ConvertStats,
  ConvertResult,
  LineSink,
} from "./types";
