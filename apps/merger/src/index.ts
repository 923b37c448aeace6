export { merge, inspectTemplate, createDependencies, buildVariableReport, formatVariableReport } from './pipeline/merge';
export type { MergeDependencies, VariableReport } from './pipeline/merge';
export { loadSettings, parseSettings, settingsSchema } from './config/settings';
export type { MergeSettings, LoadSettingsOptions, SourceSpec } from './config/settings';
export { TemplateCache } from './cache/template-cache';
export { serializeMetrics, resetMetrics } from './metrics/merge-metrics';
export { SofficeConverter } from './renderers/pdf-converter';
export type { OfficeConverter } from './renderers/pdf-converter';
export { S3ObjectStore } from './storage/object-store';
export type { ObjectStore } from './storage/object-store';
export { TemplateDocument } from './template/docx-document';
export { scanTemplate, placeholderKeys } from './template/token-scanner';
export { substituteTokens } from './template/substitution';
export { logger } from './logger';
