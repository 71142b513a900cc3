import type {
  Trace,
  Step,
  Breakpoint,
  BreakpointCondition,
} from "./types.js";

/**
 * Cursor over a recorded trace. Positions `0..steps.length - 1` are the
 * executed instructions; position `steps.length` is a virtual end step where
 * the execution result is shown.
 */
export class DebugSession {
  readonly trace: Trace;

  private _stepIndex: number = 0;
  private breakpoints: Breakpoint[] = [];
  /** Parsed `storageSlot` of each breakpoint that sets one, by id. */
  private readonly slots = new Map<string, bigint>();
  private nextBreakpointId = 1;

  constructor(trace: Trace) {
    this.trace = trace;
  }

  get stepIndex(): number {
    return this._stepIndex;
  }

  /** Number of cursor positions, including the end step. */
  get length(): number {
    return this.trace.steps.length + 1;
  }

  get currentStep(): Step | null {
    return this.trace.steps[this._stepIndex] ?? null;
  }

  get isAtEnd(): boolean {
    return this._stepIndex === this.trace.steps.length;
  }

  // --- Navigation ---

  stepForward(): void {
    if (this._stepIndex < this.length - 1) {
      this._stepIndex++;
    }
  }

  stepBackward(): void {
    if (this._stepIndex > 0) {
      this._stepIndex--;
    }
  }

  jumpTo(index: number): void {
    this._stepIndex = Math.max(0, Math.min(index, this.length - 1));
  }

  jumpToStart(): void {
    this._stepIndex = 0;
  }

  jumpToEnd(): void {
    this._stepIndex = this.length - 1;
  }

  // --- Breakpoints ---

  addBreakpoint(condition: BreakpointCondition): Breakpoint {
    if (Object.values(condition).every((value) => value === undefined)) {
      throw new Error("Breakpoint condition must set at least one field");
    }
    const slot =
      condition.storageSlot === undefined ? undefined : parseSlot(condition.storageSlot);
    const breakpoint = { id: `bp-${this.nextBreakpointId++}`, condition };
    if (slot !== undefined) this.slots.set(breakpoint.id, slot);
    this.breakpoints.push(breakpoint);
    return breakpoint;
  }

  removeBreakpoint(id: string): void {
    this.breakpoints = this.breakpoints.filter((bp) => bp.id !== id);
    this.slots.delete(id);
  }

  getBreakpoints(): Breakpoint[] {
    return [...this.breakpoints];
  }

  /**
   * Move to the next step that hits a breakpoint. Returns false (and stops at
   * the end step) when there is none.
   */
  continueForward(): boolean {
    for (let i = this._stepIndex + 1; i < this.trace.steps.length; i++) {
      if (this.hitsBreakpoint(i)) {
        this._stepIndex = i;
        return true;
      }
    }
    this.jumpToEnd();
    return false;
  }

  /** Like `continueForward`, towards the first step. */
  continueBackward(): boolean {
    for (let i = this._stepIndex - 1; i >= 0; i--) {
      if (this.hitsBreakpoint(i)) {
        this._stepIndex = i;
        return true;
      }
    }
    this.jumpToStart();
    return false;
  }

  private hitsBreakpoint(index: number): boolean {
    const step = this.trace.steps[index];
    return this.breakpoints.some(({ id, condition }) =>
      matches(condition, this.slots.get(id), step, index)
    );
  }
}

/** Every field set on the condition must match. */
function matches(
  condition: BreakpointCondition,
  slot: bigint | undefined,
  step: Step,
  index: number
): boolean {
  if (condition.pc !== undefined && step.pc !== condition.pc) return false;
  if (condition.opcode !== undefined && step.opcode !== condition.opcode) {
    return false;
  }
  if (condition.stepIndex !== undefined && index !== condition.stepIndex) {
    return false;
  }
  if (slot !== undefined) {
    return step.storageChanges.some((change) => BigInt(change.slot) === slot);
  }
  return true;
}

function parseSlot(slot: string): bigint {
  if (!/^0x[0-9a-fA-F]+$/.test(slot)) {
    throw new Error(`Invalid storage slot "${slot}": expected a 0x-prefixed hex number`);
  }
  return BigInt(slot);
}
