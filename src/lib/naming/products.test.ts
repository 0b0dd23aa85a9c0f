import { describe, expect, it } from 'vitest';

import { LookupError } from '../errors.js';
import { PRODUCT_CODES, PRODUCT_NAMES, expandProduct, filenameProductCode, productCode } from './products.js';

describe('product codes', () => {
  it('round-trips every code through its product name', () => {
    for (const code of PRODUCT_CODES) {
      expect(productCode(expandProduct(code))).toBe(code);
    }
    for (const name of PRODUCT_NAMES) {
      expect(expandProduct(productCode(name))).toBe(name);
    }
  });

  it('expands the short codes', () => {
    expect(expandProduct('bias_adj')).toBe('bias_adjusted');
    expect(expandProduct('raw')).toBe('non_bias_adjusted');
    expect(expandProduct('no-base')).toBe('base_independent');
  });

  it('rejects unknown codes and names instead of passing them through', () => {
    expect(() => expandProduct('b1971_2000')).toThrow(LookupError);
    expect(() => productCode('base_period_1971_2000')).toThrow("Unknown product: 'base_period_1971_2000'");
    expect(() => expandProduct('constructor')).toThrow(LookupError);
  });

  it('uses dashes in filename codes', () => {
    expect(filenameProductCode('base_period_1981_2010')).toBe('b1981-2010');
    expect(filenameProductCode('bias_adjusted')).toBe('bias-adj');
    expect(filenameProductCode('base_independent')).toBe('no-base');
  });
});
