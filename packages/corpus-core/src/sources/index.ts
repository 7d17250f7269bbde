export type { SourceDocument, SourceKind, SourceReader, TextSource, SectionsSource } from './types.js';
export { computeContentHash, stripSuffix } from './types.js';
export { SourceRegistry, createDefaultRegistry } from './registry.js';
export { RawTextReader, CleanedTextReader } from './readers/text.js';
export { SectionJsonReader, sectionFileSchema, sectionRecordSchema } from './readers/sections.js';
