import type { DataRecord } from '../types.js';
import { InvalidArgumentError } from '../errors.js';
import { isPlainObject } from '../query/guards.js';

export interface KeywordDescriptor {
  name: string;
  /** Bound when the call leaves the key out. Keys without one are left unbound. */
  default?: unknown;
}

/**
 * One parameter of a function signature, in declaration order.
 *
 * `keywords` describes a trailing options object. Its keys are bound as if
 * they were parameters of their own; with `open`, keys it does not declare
 * are accepted too.
 */
export type ParameterDescriptor =
  | { kind: 'positional'; name: string }
  | { kind: 'default'; name: string; default: unknown }
  | { kind: 'rest'; name: string }
  | { kind: 'keywords'; name: string; keys: readonly KeywordDescriptor[]; open?: boolean };

type SlotDescriptor = Extract<ParameterDescriptor, { kind: 'positional' | 'default' }>;
type RestDescriptor = Extract<ParameterDescriptor, { kind: 'rest' }>;
type KeywordsDescriptor = Extract<ParameterDescriptor, { kind: 'keywords' }>;

export function positional(name: string): ParameterDescriptor {
  return { kind: 'positional', name };
}

export function withDefault(name: string, value: unknown): ParameterDescriptor {
  return { kind: 'default', name, default: value };
}

export function rest(name: string): ParameterDescriptor {
  return { kind: 'rest', name };
}

export function keywords(
  name: string,
  keys: readonly (string | KeywordDescriptor)[],
  options: { open?: boolean } = {},
): ParameterDescriptor {
  return {
    kind: 'keywords',
    name,
    keys: keys.map((key) => (typeof key === 'string' ? { name: key } : key)),
    open: options.open ?? false,
  };
}

export interface DefineOptions {
  /**
   * Keep only what the signature declares. Undeclared keywords are dropped,
   * or gathered under the keywords parameter's name when it is open.
   */
  restricted?: boolean;
}

/**
 * Reconciles a call's arguments with a declared signature.
 *
 * `define` flattens the arguments into a record keyed by parameter name, for
 * matching; `package` rebuilds the argument list the function should
 * actually receive.
 */
export class ArgumentBinder {
  private readonly slots: readonly SlotDescriptor[];
  private readonly rest: RestDescriptor | null;
  private readonly keywords: KeywordsDescriptor | null;

  constructor(readonly parameters: readonly ParameterDescriptor[]) {
    const slots: SlotDescriptor[] = [];
    let restParam: RestDescriptor | null = null;
    let keywordsParam: KeywordsDescriptor | null = null;
    const seen = new Set<string>();

    for (const [index, param] of parameters.entries()) {
      if (seen.has(param.name)) {
        throw new InvalidArgumentError('parameters', param.name, `Duplicate parameter "${param.name}"`);
      }
      seen.add(param.name);

      switch (param.kind) {
        case 'positional':
          if (slots.some((slot) => slot.kind === 'default')) {
            throw new InvalidArgumentError(
              'parameters',
              param.name,
              `Parameter "${param.name}" without a default follows a parameter with one`,
            );
          }
          slots.push(param);
          break;
        case 'default':
          slots.push(param);
          break;
        case 'rest':
        case 'keywords':
          if (index !== parameters.length - 1) {
            throw new InvalidArgumentError(
              'parameters',
              param.name,
              `Parameter "${param.name}" of kind "${param.kind}" must be declared last`,
            );
          }
          if (param.kind === 'rest') restParam = param;
          else keywordsParam = assertUniqueKeys(param);
          break;
      }
    }

    this.slots = slots;
    this.rest = restParam;
    this.keywords = keywordsParam;
  }

  /** Flattens call arguments into a record keyed by parameter name. */
  define(args: readonly unknown[], options: DefineOptions = {}): DataRecord {
    const record: DataRecord = {};

    this.slots.forEach((slot, index) => {
      const value = args[index];
      if (value !== undefined) {
        record[slot.name] = value;
      } else if (slot.kind === 'default') {
        record[slot.name] = slot.default;
      }
    });

    if (this.rest !== null) {
      record[this.rest.name] = args.slice(this.slots.length);
    }

    if (this.keywords !== null) {
      const passed = keywordBag(args[this.slots.length]);
      Object.assign(record, this.declaredKeywords(this.keywords, passed));

      const extra = undeclaredKeywords(this.keywords, passed);
      if (!options.restricted) {
        Object.assign(record, extra);
      } else if (this.keywords.open) {
        record[this.keywords.name] = extra;
      }
    }

    return record;
  }

  /**
   * Builds the argument list for the real call: positionals beyond the
   * signature are cut (unless it has a rest parameter) and the keywords
   * object is reduced to what the signature accepts, defaults filled in.
   */
  package(args: readonly unknown[]): unknown[] {
    if (this.rest !== null) return [...args];
    if (this.keywords === null) return args.slice(0, this.slots.length);

    const packaged = this.slots.map((_, index) => args[index]);
    const passed = keywordBag(args[this.slots.length]);
    const bag = this.declaredKeywords(this.keywords, passed);
    if (this.keywords.open) Object.assign(bag, undeclaredKeywords(this.keywords, passed));
    packaged.push(bag);
    return packaged;
  }

  /** Calls `fn` with the packaged arguments. */
  call<A extends unknown[], R>(fn: (...args: A) => R, args: A): R {
    // Safe: package() keeps the positional layout of A, only trimming
    // excess arguments and normalizing the trailing keywords object.
    return fn(...(this.package(args) as A));
  }

  private declaredKeywords(descriptor: KeywordsDescriptor, passed: Record<string, unknown>): DataRecord {
    const bound: DataRecord = {};
    for (const key of descriptor.keys) {
      if (Object.prototype.hasOwnProperty.call(passed, key.name)) {
        bound[key.name] = passed[key.name];
      } else if (key.default !== undefined) {
        bound[key.name] = key.default;
      }
    }
    return bound;
  }
}

function keywordBag(value: unknown): Record<string, unknown> {
  if (value === undefined) return {};
  if (!isPlainObject(value)) {
    throw new InvalidArgumentError('keywords', value, 'Keyword arguments must be passed as a plain object');
  }
  return value;
}

function undeclaredKeywords(descriptor: KeywordsDescriptor, passed: Record<string, unknown>): DataRecord {
  const declared = new Set(descriptor.keys.map((key) => key.name));
  const extra: DataRecord = {};
  for (const [key, value] of Object.entries(passed)) {
    if (!declared.has(key)) extra[key] = value;
  }
  return extra;
}

function assertUniqueKeys(descriptor: KeywordsDescriptor): KeywordsDescriptor {
  const names = new Set<string>();
  for (const key of descriptor.keys) {
    if (names.has(key.name)) {
      throw new InvalidArgumentError('parameters', key.name, `Duplicate keyword "${key.name}"`);
    }
    names.add(key.name);
  }
  return descriptor;
}
