import { ExternalDependencyError, StructuralError, isPlainRecord } from '@rulechain/core';
import { getLogger } from '@rulechain/logger';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import type { ContentSniffer, LocaleStore, UniquenessChecker } from './collaborators.js';
import { collectReport, type CallContext } from './evaluation/aggregator.js';
import { ConcurrencyLimiter } from './evaluation/limiter.js';
import type { Report } from './evaluation/report.js';
import { DEFAULT_LOCALE, bundledLocaleStore } from './messages/locale-store.js';
import { MessageSynthesizer } from './messages/message-synthesizer.js';
import { checkShape, type RecordShape } from './shape/field-spec.js';
import { FileTypeSniffer } from './sniffer/file-type-sniffer.js';

const logger = getLogger('Validator');

export const validatorSettingsSchema = z.object({
  locale: z.string().trim().min(1).default(DEFAULT_LOCALE),
  maxConcurrency: z.number().int().min(1).max(1024).default(16),
  maxDepth: z.number().int().min(1).max(256).default(32),
});

export type ValidatorSettings = z.infer<typeof validatorSettingsSchema>;

export interface ValidatorOptions extends Partial<ValidatorSettings> {
  /** Message templates; defaults to the bundled `en` and `fr` tables */
  messages?: LocaleStore | undefined;
  /** Backs the `unique` rule; the rule faults when it is missing */
  uniqueness?: UniquenessChecker | undefined;
  /** Backs `image`, `mimes` and the typed `file:` rules; defaults to magic-number detection */
  sniffer?: ContentSniffer | undefined;
}

export interface ValidateCallOptions {
  /** Locale for this call only */
  locale?: string | undefined;
}

export type ValidationCallError = StructuralError | ExternalDependencyError;

/**
 * Validates records against their declared shapes.
 *
 * A call resolves to `ok(report)` for any record, valid or not; an empty
 * report means valid. It resolves to `err` only when the arguments are not
 * a shape and a record, or an external dependency (the uniqueness checker)
 * fails.
 */
export class Validator {
  private readonly messages: MessageSynthesizer;

  constructor(
    private readonly settings: ValidatorSettings,
    private readonly collaborators: {
      messages: LocaleStore;
      uniqueness: UniquenessChecker | undefined;
      sniffer: ContentSniffer;
    }
  ) {
    this.messages = new MessageSynthesizer(collaborators.messages);
  }

  get locale(): string {
    return this.settings.locale;
  }

  async validate(
    shape: RecordShape,
    input: unknown,
    options?: ValidateCallOptions
  ): Promise<Result<Report, ValidationCallError>> {
    const checked = checkShape(shape);
    if (checked.isErr()) {
      return err(checked.error);
    }
    if (!isPlainRecord(input)) {
      return err(new StructuralError('validate: a record object is expected as an argument'));
    }

    const call: CallContext = {
      locale: options?.locale ?? this.settings.locale,
      maxDepth: this.settings.maxDepth,
      messages: this.messages,
      uniqueness: this.collaborators.uniqueness,
      sniffer: this.collaborators.sniffer,
      limiter: new ConcurrencyLimiter(this.settings.maxConcurrency),
      logger,
    };

    const startedAt = Date.now();
    try {
      const report = await collectReport(shape, input, call, 0);
      logger.debug(
        { durationMs: Date.now() - startedAt, fields: Object.keys(shape).length, violations: Object.keys(report).length },
        'Validated record'
      );
      return ok(report);
    } catch (error) {
      if (error instanceof ExternalDependencyError) {
        logger.error({ error }, 'Validation aborted by external dependency failure');
        return err(error);
      }
      throw error;
    }
  }
}

/**
 * Build a validator from options. Fails when a setting is out of range.
 */
export function createValidator(options: ValidatorOptions = {}): Result<Validator, Error> {
  const { messages, uniqueness, sniffer, ...settings } = options;
  const parsed = validatorSettingsSchema.safeParse(settings);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    return err(new Error(`Invalid validator options: ${issues}`));
  }

  return ok(
    new Validator(parsed.data, {
      messages: messages ?? bundledLocaleStore(),
      uniqueness,
      sniffer: sniffer ?? new FileTypeSniffer(),
    })
  );
}
