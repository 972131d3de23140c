export { createValidator, validatorSettingsSchema, Validator } from './validator.js';
export type { ValidateCallOptions, ValidationCallError, ValidatorOptions, ValidatorSettings } from './validator.js';

export type { ContentSniffer, LocaleStore, UniquenessChecker, UniquenessTarget } from './collaborators.js';
export { MissingCollaboratorError, NestingDepthError, UniquenessCheckError } from './errors.js';

export { field, checkShape, FIELD_KINDS } from './shape/field-spec.js';
export type { ElementSpec, FieldKind, FieldSpec, ListFieldSpec, RecordFieldSpec, RecordShape, ScalarFieldSpec } from './shape/field-spec.js';
export { bufferFile, isUploadedFile, FieldKindMismatchError } from './shape/field-value.js';
export type { FieldValue, UploadedFile } from './shape/field-value.js';

export { parseRule, parseRuleChain } from './rules/rule-parser.js';
export type { RuleSpec } from './rules/rule-parser.js';

export { isValid } from './evaluation/report.js';
export type { Report, ReportEntry } from './evaluation/report.js';
export { ConcurrencyLimiter } from './evaluation/limiter.js';

export { BUNDLED_LOCALES, DEFAULT_LOCALE, TableLocaleStore, bundledLocaleStore } from './messages/locale-store.js';
export type { LocaleTable } from './messages/locale-store.js';
export { MessageSynthesizer } from './messages/message-synthesizer.js';
export { formatFieldName } from './messages/format-field-name.js';

export { FileTypeSniffer } from './sniffer/file-type-sniffer.js';
