// Values and basetypes
export type {
  BasetypeName,
  BasetypeFamily,
  Basetype,
  Codec,
  CellValue,
  DatatypeFormat,
  FormatObject,
  JsonValue,
} from './codec';
export { BASETYPE_NAMES, isBasetypeName } from './codec';
export { BASETYPES, getBasetype } from './basetypes';
export { DateTimeValue } from './dateTimeValue';
export type { TemporalKind, DateTimeFields } from './dateTimeValue';
export { Duration } from './duration';

// Patterns
export type { DateTimePattern } from './dateTimePattern';
export { compileDateTimePattern, parseWithPattern, formatWithPattern } from './dateTimePattern';
export { NumberPattern } from './numberPattern';

// Description model
export type { Mapping, PartitionedProperties, TemplateValues } from './description';
export { partitionProperties, NaturalLanguage, Link, UriTemplate } from './description';
export type { InheritedProperties, TextDirection } from './inheritance';
export { INHERITED_DEFAULTS, InheritableDescription } from './inheritance';
export type { DatatypeDescription, BoundLiteral } from './datatype';
export { Datatype } from './datatype';
export type { ColumnValue, ColumnInit } from './column';
export { Column } from './column';
export type { SchemaInit } from './schema';
export { Schema, ForeignKey, Reference } from './schema';

// Data
export type { DialectOptions, TrimMode, RawRow, RawRowStream, RowSource, Comment } from './dialect';
export { Dialect, textSource, fileSource, formatRecords } from './dialect';
export type { Row, RowWithMetadata, ReadOptions, TableInit, TableDirection } from './table';
export { Table } from './table';
export type { TableGroupOptions, TableGroupInit, ForeignKeyEdge } from './tableGroup';
export { TableGroup, validateMetadataDocument } from './tableGroup';

// Errors and logging
export type { ReadResult } from './errors';
export {
  CsvwError,
  InvalidDescriptionError,
  InvalidLexicalValueError,
  MissingRequiredValueError,
  MissingRequiredColumnError,
  SchemaShapeError,
  ReferentialIntegrityError,
  PrimaryKeyViolationError,
  CellError,
  attempt,
  unwrap,
  logOrRaise,
} from './errors';
export type { LogSink } from './logger';
export { logger, createComponentLogger, silentLog, CollectingLog } from './logger';
