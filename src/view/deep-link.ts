import { warnDev } from '../core/dev.js';
import type { ViewRegistry } from './view-registry.js';
import type { ViewState } from './view-state.js';
import type { ParameterValue, ViewDefinition } from './types.js';

const CLASS_KEY = 'Class';
const PARAM_PREFIX = 'Param-';
const FIELD_PREFIX = 'Field-';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;

export interface DecodedDeepLink<TOutput = unknown> {
  /** Resolved view, absent when the link names none or an unknown one. */
  view: ViewDefinition<TOutput> | undefined;
  /** The `Class` name that did not resolve, kept for diagnostics. */
  unresolvedIdentity: string | undefined;
  parameterUpdates: Map<string, ParameterValue>;
  fieldUpdates: Map<string, string>;
}

export interface EncodeDeepLinkOptions {
  /** Default: true. */
  includeFields?: boolean;
}

// "+012.50" -> "12.5", "-.0" -> "0": the form String(number) prints.
function canonicalDecimal(text: string): string {
  const negative = text.startsWith('-');
  const [whole = '', fraction = ''] = text.replace(/^[+-]/, '').split('.');
  const intPart = whole.replace(/^0+/, '') || '0';
  const fracPart = fraction.replace(/0+$/, '');
  const digits = fracPart ? `${intPart}.${fracPart}` : intPart;
  return negative && digits !== '0' ? `-${digits}` : digits;
}

/**
 * Coerce a `Param-` value: integer, then decimal, then the raw string.
 * First successful parse wins. A number that cannot hold every digit of the
 * text stays a string.
 */
export function coerceParameterValue(raw: string): ParameterValue {
  const text = raw.trim();

  if (INTEGER_PATTERN.test(text)) {
    const value = Number(text);
    return Number.isSafeInteger(value) ? value : raw;
  }

  if (DECIMAL_PATTERN.test(text)) {
    const value = Number(text);
    if (Number.isFinite(value) && String(value) === canonicalDecimal(text)) return value;
  }

  return raw;
}

/**
 * Decode `?Class=<name>(&Param-<n>=<v>)*(&Field-<n>=<v>)*`.
 *
 * Pure: resolves names against the registry and returns the updates; applying
 * them is the controller's job. Unknown keys are ignored; a repeated key keeps
 * its last value.
 */
export function decodeDeepLink<TOutput>(
  query: string,
  registry: ViewRegistry<TOutput>
): DecodedDeepLink<TOutput> {
  const search = new URLSearchParams(query.startsWith('?') ? query.slice(1) : query);
  const decoded: DecodedDeepLink<TOutput> = {
    view: undefined,
    unresolvedIdentity: undefined,
    parameterUpdates: new Map(),
    fieldUpdates: new Map(),
  };

  for (const [key, value] of search) {
    if (key === CLASS_KEY) {
      const view = registry.resolve(value);
      decoded.view = view;
      decoded.unresolvedIdentity = view ? undefined : value;
    } else if (key.startsWith(PARAM_PREFIX) && key.length > PARAM_PREFIX.length) {
      decoded.parameterUpdates.set(key.slice(PARAM_PREFIX.length), coerceParameterValue(value));
    } else if (key.startsWith(FIELD_PREFIX) && key.length > FIELD_PREFIX.length) {
      decoded.fieldUpdates.set(key.slice(FIELD_PREFIX.length), value);
    }
  }

  return decoded;
}

function toQueryValue(kind: string, name: string, value: ParameterValue): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'boolean') return String(value);
  warnDev(`${kind} "${name}" is not a string, number or boolean and was left out of the deep link.`);
  return null;
}

/**
 * Encode a ViewState as a shareable query string (with the leading `?`).
 *
 * Only primitive values are written; `decodeDeepLink` reads numbers back as
 * numbers and everything else as strings.
 */
export function encodeDeepLink<TOutput>(
  state: ViewState<TOutput>,
  options: EncodeDeepLinkOptions = {}
): string {
  const search = new URLSearchParams();
  search.append(CLASS_KEY, state.view.name);

  for (const [name, value] of Object.entries(state.parameters())) {
    const text = toQueryValue('Parameter', name, value);
    if (text !== null) search.append(PARAM_PREFIX + name, text);
  }

  if (options.includeFields ?? true) {
    for (const [name, value] of Object.entries(state.fields())) {
      const text = toQueryValue('Field', name, value);
      if (text !== null) search.append(FIELD_PREFIX + name, text);
    }
  }

  return `?${search.toString()}`;
}
