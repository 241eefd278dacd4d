import type { RemoteEngine } from './engineTypes.js';
import { parseExpression, parseStatement, type Expr } from './scriptSyntax.js';
import { EngineInvocationError, errorMessage } from '../errors.js';
import { logDebug } from '../dx/logger.js';

/**
 * Body of a function the scripted engine can call.
 *
 * Receives positional arguments and the number of requested outputs and
 * returns at least that many values.
 */
export type EngineFunction = (args: unknown[], nargout: number) => unknown[] | Promise<unknown[]>;

type Definition = {
  body: EngineFunction;
  /** null: on the search path, callable from anywhere */
  directory: string | null;
};

export type EngineCall = { name: string; args: unknown[]; nargout: number };

/**
 * In-process engine with a variable namespace, a working directory and
 * functions implemented in JS.
 *
 * A function defined with a `directory` is only visible while the working
 * directory is that directory, the way a script file outside the search
 * path is.
 */
export class ScriptedEngine implements RemoteEngine {
  /** Every statement and expression evaluated, in order. */
  readonly statements: string[] = [];
  /** Every function call made, including calls from statements. */
  readonly calls: EngineCall[] = [];

  private readonly vars = new Map<string, unknown>();
  private readonly functions = new Map<string, Definition[]>();
  private cwd: string;

  constructor(opts?: { cwd?: string }) {
    this.cwd = opts?.cwd ?? '/';
  }

  get workingDirectory(): string {
    return this.cwd;
  }

  /** Snapshot of the namespace. */
  variables(): ReadonlyMap<string, unknown> {
    return new Map(this.vars);
  }

  define(name: string, body: EngineFunction, opts?: { directory?: string }): this {
    const list = this.functions.get(name) ?? [];
    list.push({ body, directory: opts?.directory ?? null });
    this.functions.set(name, list);
    return this;
  }

  async evaluate(statement: string): Promise<void> {
    this.statements.push(statement);
    logDebug('engine eval', statement);

    const stmt = parseStatement(statement);
    switch (stmt.kind) {
      case 'clear':
        if (stmt.names.length === 0) this.vars.clear();
        for (const name of stmt.names) this.vars.delete(name);
        return;
      case 'assign': {
        const values = await this.evalExpr(stmt.expr, stmt.targets.length);
        stmt.targets.forEach((name, i) => this.vars.set(name, values[i]));
        return;
      }
      case 'expr':
        await this.evalExpr(stmt.expr, 0);
        return;
    }
  }

  async evaluateReturning(expression: string, resultCount: number): Promise<unknown[]> {
    this.statements.push(expression);
    const expr = parseExpression(expression);
    return this.evalExpr(expr, resultCount);
  }

  async callByName(name: string, args: readonly unknown[]): Promise<void> {
    await this.call(name, [...args], 0);
  }

  async callByNameReturning(
    name: string,
    resultCount: number,
    args: readonly unknown[],
  ): Promise<unknown[]> {
    return this.call(name, [...args], resultCount);
  }

  async setVariable(name: string, value: unknown): Promise<void> {
    this.vars.set(name, value);
  }

  async getVariable(name: string): Promise<unknown> {
    if (!this.vars.has(name)) {
      throw new EngineInvocationError(`Undefined variable: ${name}`);
    }
    return this.vars.get(name);
  }

  async listBoundNames(): Promise<ReadonlySet<string>> {
    return new Set(this.vars.keys());
  }

  private async evalExpr(expr: Expr, nargout: number): Promise<unknown[]> {
    switch (expr.kind) {
      case 'literal':
        return [expr.value];
      case 'ident':
        if (this.vars.has(expr.name)) return [this.vars.get(expr.name)];
        return this.call(expr.name, [], nargout);
      case 'call': {
        if (this.vars.has(expr.name)) {
          throw new EngineInvocationError(`Indexing is not supported: ${expr.name}`);
        }
        const args: unknown[] = [];
        for (const a of expr.args) {
          const [v] = await this.evalExpr(a, 1);
          args.push(v);
        }
        return this.call(expr.name, args, nargout);
      }
    }
  }

  private builtin(name: string, args: unknown[]): unknown[] | undefined {
    switch (name) {
      case 'pwd':
        return [this.cwd];
      case 'cd': {
        const [dir] = args;
        if (args.length === 0) return [this.cwd];
        if (typeof dir !== 'string' || dir.length === 0) {
          throw new EngineInvocationError('cd: directory must be a non-empty string');
        }
        this.cwd = dir;
        return [];
      }
      case 'who':
        return [[...this.vars.keys()].sort()];
      default:
        return undefined;
    }
  }

  private resolve(name: string): Definition | undefined {
    const list = this.functions.get(name);
    if (!list) return undefined;
    return (
      list.find((d) => d.directory === this.cwd) ?? list.find((d) => d.directory === null)
    );
  }

  private async call(name: string, args: unknown[], nargout: number): Promise<unknown[]> {
    this.calls.push({ name, args, nargout });

    let results = this.builtin(name, args);
    if (results === undefined) {
      const def = this.resolve(name);
      if (!def) {
        throw new EngineInvocationError(`Undefined function or variable: ${name}`);
      }
      try {
        results = await def.body(args, nargout);
      } catch (err) {
        if (err instanceof EngineInvocationError) throw err;
        throw new EngineInvocationError(`Error in ${name}: ${errorMessage(err)}`, { cause: err });
      }
    }

    if (results.length < nargout) {
      throw new EngineInvocationError(
        `Too many output arguments: ${name} returned ${results.length}, ${nargout} requested`,
      );
    }
    return results.slice(0, nargout);
  }
}
