import { mock, test } from 'node:test';
import assert from 'node:assert/strict';

import { resetDevWarnings, setDevMode } from '../src/core/dev.js';
import { defineView } from '../src/view/define.js';
import { coerceParameterValue, decodeDeepLink, encodeDeepLink } from '../src/view/deep-link.js';
import { createViewRegistry } from '../src/view/view-registry.js';
import { createViewState } from '../src/view/view-state.js';
import { Forecast } from './helpers.js';

const Foo = defineView<string>({ name: 'Foo', create: () => 'foo' });
const registry = createViewRegistry<string>({ views: [Foo, Forecast] });

test('decodeDeepLink(): identity, typed parameters and raw fields', () => {
  const decoded = decodeDeepLink('?Class=Foo&Param-ID=5&Param-Name=Bob&Field-Note=hi', registry);

  assert.equal(decoded.view, Foo);
  assert.equal(decoded.unresolvedIdentity, undefined);
  assert.deepEqual(decoded.parameterUpdates, new Map<string, unknown>([['ID', 5], ['Name', 'Bob']]));
  assert.deepEqual(decoded.fieldUpdates, new Map([['Note', 'hi']]));
});

test('decodeDeepLink(): decimal parameters become numbers', () => {
  const decoded = decodeDeepLink('?Param-Price=12.50', registry);
  assert.equal(decoded.parameterUpdates.get('Price'), 12.5);
});

test('decodeDeepLink(): fields are never coerced', () => {
  const decoded = decodeDeepLink('?Field-Count=5', registry);
  assert.equal(decoded.fieldUpdates.get('Count'), '5');
});

test('decodeDeepLink(): an unknown view name leaves the identity absent', () => {
  const decoded = decodeDeepLink('?Class=DoesNotExist', registry);

  assert.equal(decoded.view, undefined);
  assert.equal(decoded.unresolvedIdentity, 'DoesNotExist');
});

test('decodeDeepLink(): unknown keys are ignored and the leading "?" is optional', () => {
  const decoded = decodeDeepLink('Class=WeatherForecastViewerView&ID=3&param-ID=4&Param-=1&Other-X=2', registry);

  assert.equal(decoded.view, Forecast);
  assert.equal(decoded.parameterUpdates.size, 0);
  assert.equal(decoded.fieldUpdates.size, 0);
});

test('decodeDeepLink(): values are percent-decoded and the last repeated key wins', () => {
  const decoded = decodeDeepLink('?Param-Name=Bob%20Smith&Field-Note=a+b&Param-ID=1&Param-ID=2', registry);

  assert.deepEqual(decoded.parameterUpdates, new Map<string, unknown>([['Name', 'Bob Smith'], ['ID', 2]]));
  assert.deepEqual(decoded.fieldUpdates, new Map([['Note', 'a b']]));
});

test('coerceParameterValue(): integer, then decimal, then the raw string', () => {
  assert.equal(coerceParameterValue('-7'), -7);
  assert.equal(coerceParameterValue('+3'), 3);
  assert.equal(coerceParameterValue(' 42 '), 42);
  assert.equal(coerceParameterValue('.5'), 0.5);
  assert.equal(coerceParameterValue('1e3'), '1e3');
  assert.equal(coerceParameterValue('0x10'), '0x10');
  assert.equal(coerceParameterValue(''), '');
});

test('coerceParameterValue(): numbers that would lose digits stay strings', () => {
  assert.equal(coerceParameterValue('12345678901234567890'), '12345678901234567890');
  assert.equal(coerceParameterValue('-9007199254740993'), '-9007199254740993');
  assert.equal(coerceParameterValue('9007199254740991'), 9007199254740991);
  assert.equal(coerceParameterValue('0.12345678901234567890'), '0.12345678901234567890');
  assert.equal(coerceParameterValue('+012.50'), 12.5);
  assert.equal(coerceParameterValue('3.'), 3);
});

test('decodeDeepLink(): keys named like Object.prototype members are kept', () => {
  const decoded = decodeDeepLink('?Param-__proto__=5&Field-__proto__=x&Param-constructor=c', registry);

  assert.deepEqual([...decoded.parameterUpdates], [['__proto__', 5], ['constructor', 'c']]);
  assert.deepEqual([...decoded.fieldUpdates], [['__proto__', 'x']]);
});

test('encodeDeepLink(): writes Class, then parameters, then fields', () => {
  const state = createViewState(Forecast, { ID: 5, City: 'New York' });
  state.setField('Note', 'hi');

  assert.equal(
    encodeDeepLink(state),
    '?Class=WeatherForecastViewerView&Param-ID=5&Param-City=New+York&Field-Note=hi'
  );
  assert.equal(encodeDeepLink(state, { includeFields: false }), '?Class=WeatherForecastViewerView&Param-ID=5&Param-City=New+York');
});

test('encodeDeepLink(): skips values a query string cannot carry', () => {
  setDevMode(false);
  try {
    const state = createViewState(Forecast, { ID: 5, Filter: { from: 1 } });
    assert.equal(encodeDeepLink(state), '?Class=WeatherForecastViewerView&Param-ID=5');
  } finally {
    setDevMode(true);
  }
});

test('encodeDeepLink(): warns once per skipped value in dev mode', () => {
  resetDevWarnings();
  const warn = mock.method(console, 'warn', () => {});
  try {
    const state = createViewState(Forecast, { Filter: { from: 1 } });
    encodeDeepLink(state);
    encodeDeepLink(state);
    assert.equal(warn.mock.callCount(), 1);
    assert.deepEqual(warn.mock.calls[0]?.arguments, [
      '[Switchyard] Parameter "Filter" is not a string, number or boolean and was left out of the deep link.',
    ]);

    resetDevWarnings();
    encodeDeepLink(state);
    assert.equal(warn.mock.callCount(), 2);
  } finally {
    warn.mock.restore();
    resetDevWarnings();
  }
});

test('a decoded link reproduces the encoded state', () => {
  const state = createViewState(Forecast, { ID: 5, Price: 12.5, City: 'Oslo' });
  state.setField('Note', 'hi');

  const decoded = decodeDeepLink(encodeDeepLink(state), registry);
  assert.equal(decoded.view, Forecast);
  assert.deepEqual(Object.fromEntries(decoded.parameterUpdates), state.parameters());
  assert.deepEqual(Object.fromEntries(decoded.fieldUpdates), state.fields());
});
