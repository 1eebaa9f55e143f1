import { PROMPT_TEMPLATES } from '../../shared/prompts';

export const loadPrompt = (filename: string): string => {
  const content = PROMPT_TEMPLATES[filename];
  if (!content) {
    throw new Error(`Missing prompt template: ${filename}`);
  }
  return content;
};

/** Replaces every `{name}` placeholder present in `values`; others stay untouched. */
export const fillTemplate = (template: string, values: Record<string, string>): string =>
  template.replace(/\{([a-z_]+)\}/gi, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : match,
  );
