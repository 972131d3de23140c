import type { LocaleStore } from '../collaborators.js';

export interface RenderRequest {
  locale: string;
  /** Human-readable field label, first placeholder */
  label: string;
  /** Rule parameters, second and third placeholders */
  params?: readonly string[] | undefined;
  /** Caller-supplied message that replaces the template */
  override?: string | undefined;
}

const PLACEHOLDER = /\{(\d)\}/g;

/**
 * Turns a violated rule's message key into text.
 */
export class MessageSynthesizer {
  constructor(private readonly store: LocaleStore) {}

  render(key: string, request: RenderRequest): string {
    if (request.override !== undefined && request.override !== '') {
      return request.override;
    }

    // Missing templates surface the key itself rather than failing.
    const template = this.store.lookup(request.locale, key);
    if (template === undefined) {
      return key;
    }

    const args = [request.label, ...(request.params ?? [])].slice(0, 3);
    return template.replace(PLACEHOLDER, (placeholder, index: string) => args[Number(index)] ?? placeholder);
  }
}
