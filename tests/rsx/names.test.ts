import { describe, it, expect } from 'vitest';
import {
  attributeKey,
  elementIdentifier,
  isRsxIdentifier,
  toRsxIdentifier,
} from '../../src/rsx/names';

describe('toRsxIdentifier (RSX)', () => {
  it('should replace hyphens with underscores', () => {
    expect(toRsxIdentifier('stroke-width')).toBe('stroke_width');
    expect(toRsxIdentifier('fill-rule')).toBe('fill_rule');
  });

  it('should keep names without hyphens, case included', () => {
    expect(toRsxIdentifier('viewBox')).toBe('viewBox');
    expect(toRsxIdentifier('x')).toBe('x');
  });

  it('should be a no-op when applied twice', () => {
    const once = toRsxIdentifier('stroke-dash-array');
    expect(toRsxIdentifier(once)).toBe(once);
  });
});

describe('isRsxIdentifier (RSX)', () => {
  it('should accept identifiers and reject the rest', () => {
    expect(isRsxIdentifier('font_weight')).toBe(true);
    expect(isRsxIdentifier('_private')).toBe(true);
    expect(isRsxIdentifier('ünïcode')).toBe(true);
    expect(isRsxIdentifier('_')).toBe(false);
    expect(isRsxIdentifier('1st')).toBe(false);
    expect(isRsxIdentifier('xlink:href')).toBe(false);
    expect(isRsxIdentifier('')).toBe(false);
  });
});

describe('attributeKey (RSX)', () => {
  it('should map hyphenated attributes to identifiers', () => {
    expect(attributeKey('font-weight')).toBe('font_weight');
    expect(attributeKey('viewBox')).toBe('viewBox');
  });

  it('should write keywords as raw identifiers', () => {
    expect(attributeKey('type')).toBe('r#type');
    expect(attributeKey('in')).toBe('r#in');
  });

  it('should suffix keywords that cannot be raw identifiers', () => {
    expect(attributeKey('self')).toBe('self_');
    expect(attributeKey('_')).toBe('__');
  });

  it('should quote names that are not identifiers', () => {
    expect(attributeKey('xlink:href')).toBe('"xlink:href"');
    expect(attributeKey('xml:space')).toBe('"xml:space"');
    expect(attributeKey('data-1x')).toBe('data_1x');
    expect(attributeKey('1x')).toBe('"1x"');
  });
});

describe('elementIdentifier (RSX)', () => {
  it('should keep ordinary tag names', () => {
    expect(elementIdentifier('svg')).toBe('svg');
    expect(elementIdentifier('linearGradient')).toBe('linearGradient');
  });

  it('should write the use tag as a raw identifier', () => {
    expect(elementIdentifier('use')).toBe('r#use');
  });

  it('should replace prefix separators and hyphens', () => {
    expect(elementIdentifier('svg:g')).toBe('svg_g');
    expect(elementIdentifier('font-face')).toBe('font_face');
    expect(elementIdentifier('a.b')).toBe('a_b');
  });

  it('should prefix names that start with a digit', () => {
    expect(elementIdentifier('1up')).toBe('_1up');
  });
});
