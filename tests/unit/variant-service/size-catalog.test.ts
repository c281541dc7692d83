import test from 'node:test';
import assert from 'node:assert/strict';
import {
  DEFAULT_SIZE_CATALOG,
  getWidthFromSize,
  largestSize,
  listVersionNames,
  parseSizeCatalog,
  resolveSizeCatalog,
  smallestSize,
} from '../../../services/variant-service/src/domain/variants/size-catalog';
import { ConfigError } from '../../../services/variant-service/src/domain/variants/variant-errors';

test('resolveSizeCatalog falls back to the default catalog', () => {
  assert.equal(resolveSizeCatalog(), DEFAULT_SIZE_CATALOG);
  assert.equal(resolveSizeCatalog([]), DEFAULT_SIZE_CATALOG);
  assert.deepEqual(
    DEFAULT_SIZE_CATALOG.map((entry) => `${entry.name}:${entry.width}`),
    ['xs:320', 'sm:768', 'md:1024', 'lg:1280', 'xl:1536'],
  );
});

test('resolveSizeCatalog keeps the configured order for tuples, specs and records', () => {
  assert.deepEqual(resolveSizeCatalog([['b', 200], { name: 'a', width: 100 }]), [
    { name: 'b', width: 200 },
    { name: 'a', width: 100 },
  ]);
  assert.deepEqual(resolveSizeCatalog({ small: 10, large: 20 }), [
    { name: 'small', width: 10 },
    { name: 'large', width: 20 },
  ]);
});

test('resolveSizeCatalog rejects duplicate names and non-positive widths', () => {
  assert.throws(() => resolveSizeCatalog([['xs', 320], ['xs', 640]]), ConfigError);
  assert.throws(() => resolveSizeCatalog([['xs', 0]]), ConfigError);
  assert.throws(() => resolveSizeCatalog([['xs', 12.5]]), ConfigError);
  assert.throws(() => resolveSizeCatalog([['  ', 12]]), ConfigError);
});

test('parseSizeCatalog reads name:width pairs', () => {
  assert.deepEqual(parseSizeCatalog(' xs:320 , sm:768 '), [
    { name: 'xs', width: 320 },
    { name: 'sm', width: 768 },
  ]);
  assert.equal(parseSizeCatalog(undefined), DEFAULT_SIZE_CATALOG);
  assert.throws(() => parseSizeCatalog('xs=320'), ConfigError);
});

test('getWidthFromSize returns the width or fails with the variant name', () => {
  assert.equal(getWidthFromSize(DEFAULT_SIZE_CATALOG, 'md'), 1024);

  assert.throws(
    () => getWidthFromSize(DEFAULT_SIZE_CATALOG, 'xxl'),
    (error: unknown) => error instanceof ConfigError && error.variantName === 'xxl',
  );
});

test('largestSize and smallestSize pick the first entry on ties', () => {
  const catalog = resolveSizeCatalog([['a', 100], ['b', 300], ['c', 300], ['d', 100]]);

  assert.equal(largestSize(catalog).name, 'b');
  assert.equal(smallestSize(catalog).name, 'a');
});

test('listVersionNames puts original and thumbnail before the catalog', () => {
  assert.deepEqual(listVersionNames(resolveSizeCatalog([['xs', 320], ['sm', 768]])), [
    'original',
    'thumbnail',
    'xs',
    'sm',
  ]);
});
