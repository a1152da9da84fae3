// src/core/generic/generic.ts
// Generic function declaration, registration and invocation

import { type DispatchConfig, assertValidConfig, getActiveConfig, mergeConfigs } from "../config/config";
import { applyFirst, type MethodCombiner } from "./combiners";
import { dispatch, makeCallSite, type DispatchTarget } from "./dispatch";
import { MethodRegistry, logGenericEvent } from "./registry";
import {
  type Candidate,
  type DeclaringCallable,
  type Implementation,
  type KeywordMap,
  type KeywordSpecs,
  type MethodEntry,
  type PatternConstructor,
  type PatternSource,
  type SpecToken,
  splitKeywords,
} from "./types";

// ─────────────────────────────────────────────────────────────────
// Declaration Types
// ─────────────────────────────────────────────────────────────────

/**
 * GenericOptions: a generic function gets its patterns either from a fixed
 * constructor (`construct`) or from a declaring callable run on every call
 * (`source`). With neither, spec tokens go through the identity constructor.
 */
export type GenericOptions<R, Out> = {
  construct?: PatternConstructor;
  source?: DeclaringCallable;
  combiner?: MethodCombiner<R, Out>;
  /** Per-function overrides of the active configuration, validated at declaration */
  config?: Partial<DispatchConfig>;
};

/**
 * GenericFunction: callable handle. `f(a, b, kw({ c }))` dispatches like
 * `f.invoke([a, b], { c })`.
 */
export interface GenericFunction<R, Out = R> {
  (...args: unknown[]): Out;
  readonly genericName: string;
  readonly registry: MethodRegistry<R>;
  readonly combiner: MethodCombiner<R, Out>;
  readonly source: PatternSource;

  register(specs: readonly SpecToken[], kwspecs: KeywordSpecs, method: Implementation<R>): GenericFunction<R, Out>;
  method(...specs: SpecToken[]): (impl: Implementation<R>) => GenericFunction<R, Out>;
  methodKw(specs: readonly SpecToken[], kwspecs: KeywordSpecs): (impl: Implementation<R>) => GenericFunction<R, Out>;
  lookup(specs: readonly SpecToken[], kwspecs?: KeywordSpecs): Implementation<R> | undefined;
  methods(): ReadonlyArray<MethodEntry<R>>;
  candidates(args: readonly unknown[], kwargs?: KeywordMap): Iterable<Candidate<R>>;
  invoke(args: readonly unknown[], kwargs?: KeywordMap): Out;
}

function patternSourceOf(options: { construct?: PatternConstructor; source?: DeclaringCallable }, name: string): PatternSource {
  if (options.construct && options.source) {
    throw new Error(`declareGeneric(${name}): give either construct or source, not both`);
  }
  if (options.construct) return { tag: "static", construct: options.construct };
  if (options.source) return { tag: "dynamic", source: options.source };
  return { tag: "dynamic", source: () => undefined };
}

// ─────────────────────────────────────────────────────────────────
// Declaration
// ─────────────────────────────────────────────────────────────────

export function declareGeneric<R>(name: string, options?: GenericOptions<R, R>): GenericFunction<R, R>;
export function declareGeneric<R, Out>(
  name: string,
  options: GenericOptions<R, Out> & { combiner: MethodCombiner<R, Out> }
): GenericFunction<R, Out>;
export function declareGeneric<R, Out>(
  name: string,
  options: GenericOptions<R, Out | R> = {}
): GenericFunction<R, Out | R> {
  const registry = new MethodRegistry<R>();
  const combiner: MethodCombiner<R, Out | R> = options.combiner ?? applyFirst<R>();
  const source = patternSourceOf(options, name);
  if (options.config) {
    assertValidConfig(mergeConfigs(getActiveConfig(), options.config));
  }
  const target: DispatchTarget<R> = { name, registry, source };

  const configFor = (): DispatchConfig => mergeConfigs(getActiveConfig(), options.config);

  const register = (specs: readonly SpecToken[], kwspecs: KeywordSpecs, method: Implementation<R>): void => {
    const { entry, replaced } = registry.register(specs, kwspecs, method);
    const config = configFor();
    if (config.trace) {
      logGenericEvent({
        tag: replaced ? "replace" : "register",
        name,
        key: entry.key,
        index: entry.index,
        timestamp: Date.now(),
      }, config.maxEvents);
    }
  };

  const invoke = (args: readonly unknown[], kwargs: KeywordMap = {}): Out | R => {
    const config = configFor();
    const call = makeCallSite(name, args, kwargs, config);
    return combiner.combine(dispatch(target, args, kwargs, config), call);
  };

  const handle: GenericFunction<R, Out | R> = Object.assign(
    (...raw: unknown[]): Out | R => {
      const { args, kwargs } = splitKeywords(raw);
      return invoke(args, kwargs);
    },
    {
      genericName: name,
      registry,
      combiner,
      source,
      register(specs: readonly SpecToken[], kwspecs: KeywordSpecs, method: Implementation<R>) {
        register(specs, kwspecs, method);
        return handle;
      },
      method(...specs: SpecToken[]) {
        return (impl: Implementation<R>) => {
          register(specs, {}, impl);
          return handle;
        };
      },
      methodKw(specs: readonly SpecToken[], kwspecs: KeywordSpecs) {
        return (impl: Implementation<R>) => {
          register(specs, kwspecs, impl);
          return handle;
        };
      },
      lookup(specs: readonly SpecToken[], kwspecs?: KeywordSpecs) {
        return registry.lookup(specs, kwspecs);
      },
      methods() {
        return registry.snapshot();
      },
      candidates(args: readonly unknown[], kwargs: KeywordMap = {}) {
        return dispatch(target, args, kwargs, configFor());
      },
      invoke,
    }
  );
  Object.defineProperty(handle, "name", { value: name });
  return handle;
}

// ─────────────────────────────────────────────────────────────────
// Free-function API
// ─────────────────────────────────────────────────────────────────

export function registerMethod<R, Out>(
  generic: GenericFunction<R, Out>,
  specs: readonly SpecToken[],
  kwspecs: KeywordSpecs,
  implementation: Implementation<R>
): GenericFunction<R, Out> {
  return generic.register(specs, kwspecs, implementation);
}

/**
 * Decorator-style registration: `method(add, "integer", "integer")((x, y) => x + y)`.
 */
export function method<R, Out>(
  generic: GenericFunction<R, Out>,
  ...specs: SpecToken[]
): (implementation: Implementation<R>) => GenericFunction<R, Out> {
  return generic.method(...specs);
}

export function invoke<R, Out>(
  generic: GenericFunction<R, Out>,
  args: readonly unknown[],
  kwargs: KeywordMap = {}
): Out {
  return generic.invoke(args, kwargs);
}

export function lookupMethod<R, Out>(
  generic: GenericFunction<R, Out>,
  specs: readonly SpecToken[],
  kwspecs?: KeywordSpecs
): Implementation<R> | undefined {
  return generic.lookup(specs, kwspecs);
}
