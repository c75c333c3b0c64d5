import { describe, it, expect } from 'vitest';
import { getLocales, getText, emailTypeOptions } from '../../src/i18n/locales.js';

describe('locales', () => {
  it('has the same keys in every language', () => {
    const locales = getLocales();
    const keys = Object.keys(locales.FR).sort();

    expect(Object.keys(locales.EN).sort()).toEqual(keys);
    expect(Object.keys(locales.TN).sort()).toEqual(keys);
  });

  it('returns localized text', () => {
    expect(getText('EN', 'rate_limit')).toBe('⏱️ Rate limit reached. Please wait.');
    expect(getText('FR', 'timestamp')).toBe('Généré le');
  });

  it('lists email kinds in display order', () => {
    expect(emailTypeOptions('EN')).toEqual([
      'Enrollment certificate',
      'Internship request',
      'Absence justification',
      'Complaint',
    ]);
  });
});
