import { LookupError } from '../errors.js';

// Short codes used on the command line and in filenames → product names used
// by the data store and in the directory tree.
const PRODUCTS: Record<string, string> = {
  bias_adj: 'bias_adjusted',
  raw: 'non_bias_adjusted',
  b1961_1990: 'base_period_1961_1990',
  b1981_2010: 'base_period_1981_2010',
  'no-base': 'base_independent',
};

const CODES: Record<string, string> = Object.fromEntries(
  Object.entries(PRODUCTS).map(([code, name]) => [name, code])
);

export const PRODUCT_CODES = Object.keys(PRODUCTS);
export const PRODUCT_NAMES = Object.values(PRODUCTS);

export function expandProduct(code: string): string {
  const name = Object.hasOwn(PRODUCTS, code) ? PRODUCTS[code] : undefined;
  if (name === undefined) throw new LookupError('product code', code);
  return name;
}

export function productCode(name: string): string {
  const code = Object.hasOwn(CODES, name) ? CODES[name] : undefined;
  if (code === undefined) throw new LookupError('product', name);
  return code;
}

/** Product code as it appears inside filenames: `b1981_2010` → `b1981-2010`. */
export function filenameProductCode(name: string): string {
  return productCode(name).replaceAll('_', '-');
}
