export const DEFAULT_MESSAGE_TEMPLATE =
  '{date} {time} ({online}/{total})\\nT: {temp}F {snr} snr/{hops} hop\\nH: {humidity}% {ack}';

export const DEFAULT_CONFIRMATION_TEMPLATE =
  'ACK #{messageId} {snr} snr';

export type TemplateValue = string | number | undefined;

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Substitutes `{name}` placeholders. Placeholders without a value stay as
 * written, and literal `\n` sequences (as typed in a config file) become line
 * breaks.
 */
export function renderTemplate(
  template: string,
  values: Readonly<Record<string, TemplateValue>>
): string {
  return template
    .replace(/\\n/g, '\n')
    .replace(PLACEHOLDER, (placeholder: string, key: string) => {
      const value = Object.prototype.hasOwnProperty.call(values, key)
        ? values[key]
        : undefined;
      return value === undefined ? placeholder : String(value);
    });
}

export function formatSnr(snr: number | undefined): string {
  return snr === undefined || !Number.isFinite(snr) ? '--' : snr.toFixed(1);
}
