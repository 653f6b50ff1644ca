// src/host/notebook.ts
// A notebook of cell scripts driving one FlowSession: cells are parsed,
// run statement by statement under the tracer, and (in reactive mode)
// cells made ready by a run are run after it.

import type { Logger } from "pino";
import { HostEvalError, TracerStateError } from "../core/errors";
import { moduleLogger } from "../core/log/logger";
import type { Cell } from "../core/model/cell";
import type { FlowSession } from "../core/session/session";
import type { SliceOptions } from "../core/slicing/slicer";
import { Frame, Interpreter, type InterpreterOptions } from "./interp";
import { createModules, type HostModule, registerModuleEffects } from "./modules";
import { createPrims } from "./prims";
import { parseCell } from "./refs";

export type RunResult = {
  cell: Cell;
  /** Value of the last statement that ran. */
  value: unknown;
  error?: string;
  /** Ids run reactively after this cell, in run order. */
  cascade: string[];
};

export class ScriptNotebook {
  readonly globals = new Frame();
  readonly modules: Map<string, HostModule> = createModules();
  private stdout: string[] = [];
  private readonly interp: Interpreter;
  private readonly log: Logger;

  constructor(readonly session: FlowSession, opts: InterpreterOptions = {}) {
    this.log = moduleLogger(session.log, "host");
    registerModuleEffects(session.resolver.registry, this.modules);
    const prims = createPrims((line) => this.stdout.push(line));
    this.interp = new Interpreter(session.tracer, this.globals, prims, this.modules, this.log, opts);
  }

  /** Register (or edit) a cell's source without running it. */
  setCell(id: string, text: string): void {
    const parsed = parseCell(text);
    this.session.registerCell(id, parsed.text, parsed.statements);
  }

  order(ids: readonly string[]): void {
    this.session.setCellOrder(ids);
  }

  /** Value bound to a global name, if any. */
  valueOf(name: string): unknown {
    return this.globals.vars.get(name);
  }

  run(id: string, text?: string): RunResult {
    const result = this.runOnce(id, text);
    const scheduler = this.session.scheduler;
    if (!scheduler.active || result.error !== undefined) return result;

    scheduler.start(id);
    while (true) {
      const ready = scheduler.next(this.session.check());
      scheduler.schedule(ready);
      const [next] = ready;
      if (next === undefined) break;
      scheduler.markRan(next);
      result.cascade.push(next);
      const ran = this.runOnce(next);
      if (ran.error !== undefined) break;
    }
    if (result.cascade.length) this.log.debug({ cell: id, cascade: result.cascade }, "reactive cascade");
    return result;
  }

  /**
   * Run `ids` in order as one batch, stopping at the first failure. Cells
   * still queued in the batch are not marked waiting by earlier ones.
   */
  runCells(ids: readonly string[]): RunResult[] {
    const scheduler = this.session.scheduler;
    scheduler.schedule(ids);
    const results: RunResult[] = [];
    try {
      for (const id of ids) {
        scheduler.unschedule(id);
        const res = this.runOnce(id);
        results.push(res);
        if (res.error !== undefined) break;
      }
    } finally {
      scheduler.schedule([]);
    }
    return results;
  }

  /** Slice for a global name, as runnable script text. */
  slice(name: string, opts?: SliceOptions): string {
    return this.session.slice(name, opts).text({ headers: true, comment: ";" });
  }

  private runOnce(id: string, text?: string): RunResult {
    const source = text ?? this.session.cells.draft(id)?.text ?? this.session.cells.current(id)?.text;
    if (source === undefined) throw new HostEvalError(`no source for cell ${id}`);
    const parsed = parseCell(source);
    const tracer = this.session.tracer;

    const cell = tracer.beginCell(id, parsed);
    this.stdout = [];
    let value: unknown = null;
    let error: string | undefined;
    let fatal: unknown;
    try {
      parsed.forms.forEach((form, i) => {
        tracer.beginStatement(i);
        value = this.interp.evalTop(form);
        tracer.endStatement();
      });
    } catch (e) {
      error = e instanceof Error ? e.message : String(e);
      if (e instanceof TracerStateError) fatal = e;
      this.log.info({ cell: id, err: error }, "cell failed");
    }
    tracer.endCell({ error });
    this.session.recordOutput(id, {
      stdout: this.stdout.map((l) => `${l}\n`).join(""),
      stderr: error === undefined ? "" : `${error}\n`,
    });
    if (fatal !== undefined) throw fatal;
    return error === undefined ? { cell, value, cascade: [] } : { cell, value, error, cascade: [] };
  }
}
