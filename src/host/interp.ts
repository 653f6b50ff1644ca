// src/host/interp.ts
// Evaluator for cell scripts. Every read, write, call and scope change is
// reported to the tracer as it happens.

import type { Logger } from "pino";
import { HostEvalError } from "../core/errors";
import { isObjectLike } from "../core/model/identity";
import type { Scope } from "../core/model/scope";
import type { DataSymbol, ElementKey, SymbolKind } from "../core/model/symbol";
import type { CallSite } from "../core/tracing/externalCalls";
import type { ElementDeps, Tracer } from "../core/tracing/tracer";
import type { HostModule } from "./modules";
import type { PrimFn } from "./prims";
import { type Datum, isSym } from "./reader";
import { isReserved } from "./refs";

// ─────────────────────────────────────────────────────────────────
// Runtime values
// ─────────────────────────────────────────────────────────────────

export class Frame {
  readonly vars = new Map<string, unknown>();

  constructor(readonly parent?: Frame) {}

  /** Innermost frame binding `name`. */
  find(name: string): Frame | undefined {
    for (let f: Frame | undefined = this; f !== undefined; f = f.parent) {
      if (f.vars.has(name)) return f;
    }
    return undefined;
  }
}

export class Closure {
  constructor(
    readonly name: string,
    readonly params: readonly string[],
    readonly body: readonly Datum[],
    readonly frame: Frame,
    /** Tracer scope the closure was created in. */
    readonly scope: Scope,
  ) {}
}

type Evaluated = { value: unknown; syms: DataSymbol[] };

type Receiver = { method: string; receiver: unknown; receiverSymbols: DataSymbol[] };

export type InterpreterOptions = {
  maxDepth?: number;
};

const truthy = (v: unknown): boolean => v !== false && v !== null && v !== undefined;

function toData(d: Datum): unknown {
  if (isSym(d)) return d.sym;
  if (Array.isArray(d)) return d.map(toData);
  return d;
}

function symName(d: Datum | undefined, form: string): string {
  if (d === undefined || !isSym(d)) throw new HostEvalError(`${form}: expected a name`);
  return d.sym;
}

function paramNames(d: Datum | undefined, form: string): string[] {
  if (!Array.isArray(d)) throw new HostEvalError(`${form}: expected a parameter list`);
  return d.map((p) => symName(p, form));
}

function elementKey(key: unknown, form: string): ElementKey {
  if (typeof key === "string" || typeof key === "number") return key;
  throw new HostEvalError(`${form}: key must be a string or a number`);
}

function arrayIndex(arr: readonly unknown[], key: unknown, form: string, allowEnd = false): number {
  if (typeof key !== "number" || !Number.isInteger(key)) throw new HostEvalError(`${form}: index must be an integer`);
  const i = key < 0 ? arr.length + key : key;
  const limit = allowEnd ? arr.length : arr.length - 1;
  if (i < 0 || i > limit) throw new HostEvalError(`${form}: index ${key} out of range`);
  return i;
}

function objectOf(x: unknown, form: string): object {
  if (!isObjectLike(x)) throw new HostEvalError(`${form}: expected an object`);
  return x;
}

// ─────────────────────────────────────────────────────────────────
// Interpreter
// ─────────────────────────────────────────────────────────────────

export class Interpreter {
  private loadLog: DataSymbol[] = [];
  private depth = 0;
  private readonly maxDepth: number;
  /** Containers built by `list`/`dict` -> what each element was built from, until first stored. */
  private readonly pendingElements = new WeakMap<object, ElementDeps>();

  constructor(
    private readonly tracer: Tracer,
    readonly globals: Frame,
    private readonly prims: ReadonlyMap<string, PrimFn>,
    private readonly modules: ReadonlyMap<string, HostModule>,
    private readonly log: Logger,
    opts: InterpreterOptions = {},
  ) {
    this.maxDepth = opts.maxDepth ?? 200;
  }

  /** Evaluate one top-level form inside an open statement. */
  evalTop(form: Datum): unknown {
    this.loadLog = [];
    this.depth = 0;
    return this.eval(form, this.globals);
  }

  private evalWithSyms(d: Datum, env: Frame): Evaluated {
    const mark = this.loadLog.length;
    const value = this.eval(d, env);
    return { value, syms: [...new Set(this.loadLog.slice(mark))] };
  }

  private evalBody(body: readonly Datum[], env: Frame): unknown {
    let result: unknown = null;
    for (const form of body) result = this.eval(form, env);
    return result;
  }

  private eval(d: Datum, env: Frame): unknown {
    if (isSym(d)) return this.lookup(d.sym, env);
    if (!Array.isArray(d)) return d;

    const [head, ...rest] = d;
    if (head === undefined) throw new HostEvalError("cannot evaluate an empty form");

    if (isSym(head)) {
      const name = head.sym;
      if (name.startsWith(".") && name.length > 1) return this.evalMethodCall(name.slice(1), rest, env);
      switch (name) {
        case "quote": return rest[0] === undefined ? null : toData(rest[0]);
        case "define": return this.evalDefine(rest, env);
        case "set!": return this.evalSet(rest, env);
        case "if": {
          const [c, then, otherwise] = rest;
          if (c === undefined || then === undefined) throw new HostEvalError("if: expected a condition and a branch");
          if (truthy(this.eval(c, env))) return this.eval(then, env);
          return otherwise === undefined ? null : this.eval(otherwise, env);
        }
        case "begin": return this.evalBody(rest, env);
        case "lambda":
          return new Closure("<lambda>", paramNames(rest[0], "lambda"), rest.slice(1), env, this.tracer.currentScope());
        case "list": return this.evalList(rest, env);
        case "dict": return this.evalDict(rest, env);
        case "record": return this.evalRecord(rest, env);
        case "get": return this.evalGet(rest, env);
        case "attr": return this.evalAttr(rest, env);
        case "set-item!": return this.evalSetItem(rest, env);
        case "set-attr!": return this.evalSetAttr(rest, env);
        case "del!": return this.evalDelete(rest, env);
        case "del-item!": return this.evalDeleteItem(rest, env);
        case "del-attr!": return this.evalDeleteAttr(rest, env);
        case "import": return this.evalImport(rest, env);
      }
    }

    const callee = this.eval(head, env);
    const args = rest.map((a) => this.evalWithSyms(a, env));
    return this.apply(callee, args);
  }

  private lookup(name: string, env: Frame): unknown {
    const frame = env.find(name);
    if (frame !== undefined) {
      const sym = this.tracer.loadName(name);
      if (sym !== undefined) this.loadLog.push(sym);
      return frame.vars.get(name);
    }
    const prim = this.prims.get(name);
    if (prim !== undefined) return prim;
    // reports the unresolved read
    this.tracer.loadName(name);
    throw new HostEvalError(`unbound name: ${name}`);
  }

  // ─────────────────────────────────────────────────────────────────
  // Bindings
  // ─────────────────────────────────────────────────────────────────

  private bind(env: Frame, name: string, value: unknown, kind?: SymbolKind): void {
    if (isReserved(name)) throw new HostEvalError(`cannot bind reserved name ${name}`);
    env.vars.set(name, value);
    this.tracer.storeName(name, value, {
      kind: kind ?? (value instanceof Closure ? "function" : undefined),
      elements: this.takeElements(value),
    });
  }

  private takeElements(value: unknown): ElementDeps | undefined {
    if (!isObjectLike(value)) return undefined;
    const elements = this.pendingElements.get(value);
    if (elements !== undefined) this.pendingElements.delete(value);
    return elements;
  }

  private evalDefine(rest: Datum[], env: Frame): null {
    const [target, ...body] = rest;
    if (Array.isArray(target)) {
      const [fname, ...params] = paramNames(target, "define");
      if (fname === undefined) throw new HostEvalError("define: expected a function name");
      this.bind(env, fname, new Closure(fname, params, body, env, this.tracer.currentScope()), "function");
      return null;
    }
    const name = symName(target, "define");
    const [expr] = body;
    this.bind(env, name, expr === undefined ? null : this.eval(expr, env));
    return null;
  }

  private evalSet(rest: Datum[], env: Frame): null {
    const name = symName(rest[0], "set!");
    const frame = env.find(name);
    if (frame === undefined) throw new HostEvalError(`set!: unbound name: ${name}`);
    const expr = rest[1];
    const value = expr === undefined ? null : this.eval(expr, env);
    frame.vars.set(name, value);
    this.tracer.storeName(name, value, { rebind: true, elements: this.takeElements(value) });
    return null;
  }

  private evalDelete(rest: Datum[], env: Frame): null {
    const name = symName(rest[0], "del!");
    const frame = env.find(name);
    if (frame === undefined) throw new HostEvalError(`del!: unbound name: ${name}`);
    frame.vars.delete(name);
    this.tracer.deleteName(name);
    return null;
  }

  private evalImport(rest: Datum[], env: Frame): null {
    const modName = symName(rest[0], "import");
    const mod = this.modules.get(modName);
    if (mod === undefined) throw new HostEvalError(`import: no module named ${modName}`);
    const member = rest[1];
    if (member === undefined) {
      env.vars.set(modName, mod);
      this.tracer.storeImport(modName, mod, modName);
    } else {
      const name = symName(member, "import");
      if (!(name in mod)) throw new HostEvalError(`import: ${modName} has no member ${name}`);
      const value = mod[name];
      env.vars.set(name, value);
      this.tracer.storeImport(name, value, modName, name);
    }
    this.log.debug({ module: modName }, "import");
    return null;
  }

  // ─────────────────────────────────────────────────────────────────
  // Containers
  // ─────────────────────────────────────────────────────────────────

  private evalList(rest: Datum[], env: Frame): unknown[] {
    const items = rest.map((x) => this.evalWithSyms(x, env));
    const arr = items.map((it) => it.value);
    this.pendingElements.set(arr, items.map((it, i) => [i, it.syms] as const));
    return arr;
  }

  private evalDict(rest: Datum[], env: Frame): Map<ElementKey, unknown> {
    if (rest.length % 2 !== 0) throw new HostEvalError("dict: expected key/value pairs");
    const map = new Map<ElementKey, unknown>();
    const elements: Array<readonly [ElementKey, readonly DataSymbol[]]> = [];
    for (let i = 0; i < rest.length; i += 2) {
      const k = this.evalWithSyms(rest[i] ?? null, env);
      const v = this.evalWithSyms(rest[i + 1] ?? null, env);
      const key = elementKey(k.value, "dict");
      map.set(key, v.value);
      elements.push([key, [...new Set([...k.syms, ...v.syms])]]);
    }
    this.pendingElements.set(map, elements);
    return map;
  }

  private evalRecord(rest: Datum[], env: Frame): Record<string, unknown> {
    if (rest.length % 2 !== 0) throw new HostEvalError("record: expected name/value pairs");
    const out: Record<string, unknown> = {};
    for (let i = 0; i < rest.length; i += 2) {
      out[symName(rest[i], "record")] = this.eval(rest[i + 1] ?? null, env);
    }
    return out;
  }

  private evalGet(rest: Datum[], env: Frame): unknown {
    const coll = this.eval(rest[0] ?? null, env);
    const key = this.eval(rest[1] ?? null, env);
    let value: unknown;
    let at = key;
    if (Array.isArray(coll)) {
      const index = arrayIndex(coll, key, "get");
      at = index;
      value = coll[index];
    } else if (coll instanceof Map) value = coll.get(key);
    else value = Reflect.get(objectOf(coll, "get"), elementKey(key, "get"));
    const sym = this.tracer.loadSubscript(coll, at, value);
    if (sym !== undefined) this.loadLog.push(sym);
    return value ?? null;
  }

  private evalAttr(rest: Datum[], env: Frame): unknown {
    const obj = objectOf(this.eval(rest[0] ?? null, env), "attr");
    const name = symName(rest[1], "attr");
    const value: unknown = Reflect.get(obj, name);
    const sym = this.tracer.loadAttribute(obj, name, value);
    if (sym !== undefined) this.loadLog.push(sym);
    return value ?? null;
  }

  private evalSetItem(rest: Datum[], env: Frame): null {
    const coll = this.eval(rest[0] ?? null, env);
    const key = this.eval(rest[1] ?? null, env);
    const value = this.eval(rest[2] ?? null, env);
    let at = key;
    if (Array.isArray(coll)) {
      const index = arrayIndex(coll, key, "set-item!", true);
      at = index;
      coll[index] = value;
    } else if (coll instanceof Map) coll.set(elementKey(key, "set-item!"), value);
    else Reflect.set(objectOf(coll, "set-item!"), elementKey(key, "set-item!"), value);
    this.tracer.storeSubscript(coll, at, value, { elements: this.takeElements(value) });
    return null;
  }

  private evalSetAttr(rest: Datum[], env: Frame): null {
    const obj = objectOf(this.eval(rest[0] ?? null, env), "set-attr!");
    const name = symName(rest[1], "set-attr!");
    const value = this.eval(rest[2] ?? null, env);
    Reflect.set(obj, name, value);
    this.tracer.storeAttribute(obj, name, value, { elements: this.takeElements(value) });
    return null;
  }

  private evalDeleteItem(rest: Datum[], env: Frame): null {
    const coll = this.eval(rest[0] ?? null, env);
    const key = this.eval(rest[1] ?? null, env);
    if (Array.isArray(coll)) {
      const i = arrayIndex(coll, key, "del-item!");
      coll.splice(i, 1);
      this.tracer.deleteSubscript(coll, i);
      return null;
    }
    const k = elementKey(key, "del-item!");
    if (coll instanceof Map) coll.delete(k);
    else Reflect.deleteProperty(objectOf(coll, "del-item!"), k);
    this.tracer.deleteSubscript(coll, k);
    return null;
  }

  private evalDeleteAttr(rest: Datum[], env: Frame): null {
    const obj = objectOf(this.eval(rest[0] ?? null, env), "del-attr!");
    const name = symName(rest[1], "del-attr!");
    Reflect.deleteProperty(obj, name);
    this.tracer.deleteAttribute(obj, name);
    return null;
  }

  // ─────────────────────────────────────────────────────────────────
  // Calls
  // ─────────────────────────────────────────────────────────────────

  private evalMethodCall(method: string, rest: Datum[], env: Frame): unknown {
    const recv = this.evalWithSyms(rest[0] ?? null, env);
    const args = rest.slice(1).map((a) => this.evalWithSyms(a, env));
    const holder: unknown = typeof recv.value === "string" ? String.prototype : recv.value;
    const fn: unknown = isObjectLike(holder) ? Reflect.get(holder, method) : undefined;
    if (typeof fn !== "function") throw new HostEvalError(`no method ${method} on ${typeof recv.value}`);
    return this.callExternal(fn, args, { method, receiver: recv.value, receiverSymbols: recv.syms });
  }

  private apply(callee: unknown, args: Evaluated[]): unknown {
    if (callee instanceof Closure) {
      if (args.length !== callee.params.length) {
        throw new HostEvalError(`${callee.name}: expected ${callee.params.length} arguments, got ${args.length}`);
      }
      return this.applyClosure(callee, args);
    }
    if (typeof callee === "function") return this.callExternal(callee, args);
    throw new HostEvalError("not a procedure");
  }

  private applyClosure(c: Closure, args: readonly Evaluated[]): unknown {
    if (this.depth >= this.maxDepth) throw new HostEvalError(`${c.name}: maximum call depth exceeded`);
    this.depth++;
    const frame = new Frame(c.frame);
    this.tracer.enterScope(c.name, c.scope);
    try {
      c.params.forEach((p, i) => {
        const arg = args[i];
        const value = arg === undefined ? null : arg.value;
        frame.vars.set(p, value);
        this.tracer.storeName(p, value, { deps: arg?.syms ?? [] });
      });
      return this.evalBody(c.body, frame);
    } finally {
      this.tracer.exitScope();
      this.depth--;
    }
  }

  /** Call code the tracer cannot see inside; its effect comes from the resolver. */
  private callExternal(fn: Function, args: readonly Evaluated[], recv?: Receiver): unknown {
    const site: CallSite = {
      callee: fn,
      args: args.map((a) => ({ value: a.value, symbols: a.syms })),
      ...recv,
    };
    const frame = this.tracer.callEnter(site);
    const target = typeof frame.substitute === "function" ? frame.substitute : fn;
    const result: unknown = Reflect.apply(target, recv?.receiver, args.map((a) => this.toNative(a.value)));
    this.tracer.callExit(frame, result);
    return result ?? null;
  }

  /** Closures handed to native code become plain functions. */
  private toNative(v: unknown): unknown {
    if (!(v instanceof Closure)) return v;
    return (...xs: unknown[]) => this.applyClosure(v, v.params.map((_, i) => ({ value: xs[i] ?? null, syms: [] })));
  }
}
