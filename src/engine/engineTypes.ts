/**
 * The operations a remote script engine exposes to the binding layer.
 *
 * Every operation may reject with `EngineInvocationError`. The engine keeps a
 * single variable namespace and a single working directory shared by every
 * caller of the same engine.
 */
export interface RemoteEngine {
  /** Evaluates a statement for its side effects. */
  evaluate(statement: string): Promise<void>;
  /** Evaluates an expression and returns its first `resultCount` values. */
  evaluateReturning(expression: string, resultCount: number): Promise<unknown[]>;
  /** Calls a function with positional arguments, discarding any result. */
  callByName(name: string, args: readonly unknown[]): Promise<void>;
  /** Calls a function with positional arguments, returning `resultCount` values. */
  callByNameReturning(name: string, resultCount: number, args: readonly unknown[]): Promise<unknown[]>;
  setVariable(name: string, value: unknown): Promise<void>;
  getVariable(name: string): Promise<unknown>;
  /** Names currently bound in the engine's namespace. */
  listBoundNames(): Promise<ReadonlySet<string>>;
}

/** Work run against an engine as one uninterrupted unit. */
export type EngineCallable<T> = (engine: RemoteEngine) => Promise<T>;
