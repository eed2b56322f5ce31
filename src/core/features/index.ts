export * from './types.js';
export { FeatureDescriptorSchema, FeatureEntrySchema, type FeatureDescriptor, type FeatureEntry } from './schema.js';
export { parseMarkdownFeatures, parseFieldSpec, splitList, type MarkdownParseResult } from './markdown.js';
export { normalizeFeatures, normalizeOperation, type NormalizeOptions } from './normalize.js';
export { detectFormat, parseFeatureDescriptor, loadFeatureDescriptor, type DescriptorFormat } from './parser.js';
