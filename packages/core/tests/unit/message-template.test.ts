import { describe, test, expect } from 'vitest';
import {
  DEFAULT_CONFIRMATION_TEMPLATE,
  DEFAULT_MESSAGE_TEMPLATE,
  formatSnr,
  renderTemplate,
} from '../../src/message-template.js';

describe('renderTemplate', () => {
  test('should render the default telemetry template', () => {
    const message = renderTemplate(DEFAULT_MESSAGE_TEMPLATE, {
      date: '10/19',
      time: '14:05',
      online: 2,
      total: 3,
      temp: 71,
      snr: '6.5',
      hops: '1',
      humidity: 40,
      ack: '✓',
    });

    expect(message).toBe('10/19 14:05 (2/3)\nT: 71F 6.5 snr/1 hop\nH: 40% ✓');
  });

  test('should render the default confirmation template', () => {
    expect(
      renderTemplate(DEFAULT_CONFIRMATION_TEMPLATE, { messageId: 42, snr: '7.0' })
    ).toBe('ACK #42 7.0 snr');
  });

  test('should leave unknown placeholders as written', () => {
    expect(renderTemplate('{node} at {unknown}', { node: 'yang' })).toBe(
      'yang at {unknown}'
    );
  });

  test('should leave placeholders with an undefined value as written', () => {
    expect(renderTemplate('SNR {snr}', { snr: undefined })).toBe('SNR {snr}');
  });

  test('should not resolve inherited object keys', () => {
    expect(renderTemplate('{toString}', {})).toBe('{toString}');
  });

  test('should keep real line breaks', () => {
    expect(renderTemplate('a\nb', {})).toBe('a\nb');
  });
});

describe('formatSnr', () => {
  test.each([
    [7, '7.0'],
    [-3.25, '-3.3'],
    [12.04, '12.0'],
    [undefined, '--'],
    [Number.NaN, '--'],
    [Number.POSITIVE_INFINITY, '--'],
  ])('should format %s as %s', (snr, expected) => {
    expect(formatSnr(snr)).toBe(expected);
  });
});
