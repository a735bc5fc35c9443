/**
 * Stream session: the single-request state of one pipeline run.
 * Tracks the phase machine, counters and timing. Owns no model resources.
 */

import { PipelineCancelledError } from "../../errors/PipelineError.js";
import {
  type SessionState,
  type PipelinePhase,
  generateId,
  getTimestamp,
} from "./PipelineTypes.js";

/**
 * Allowed transitions of the phase machine. FAILED and CANCELLED are reachable
 * from every non-terminal state. BACK_TRANSLATING begins with the first
 * complete unit while generation is still streaming.
 */
const TRANSITIONS: Readonly<Record<SessionState, readonly SessionState[]>> = {
  CREATED: ["TRANSLATING_INPUT"],
  TRANSLATING_INPUT: ["SEPARATOR"],
  SEPARATOR: ["GENERATING"],
  GENERATING: ["BACK_TRANSLATING", "DONE"],
  BACK_TRANSLATING: ["DONE"],
  DONE: [],
  FAILED: [],
  CANCELLED: [],
};

const TERMINAL_STATES: ReadonlySet<SessionState> = new Set(["DONE", "FAILED", "CANCELLED"]);

export interface StreamSessionOptions {
  /** Session identifier. Auto-generated if not provided. */
  readonly sessionId?: string;
  readonly backTranslate?: boolean;
}

export interface SessionStateChange {
  readonly sessionId: string;
  readonly from: SessionState;
  readonly to: SessionState;
  readonly timestamp: number;
}

export type SessionStateListener = (change: SessionStateChange) => void;

export interface SessionInfo {
  readonly sessionId: string;
  readonly state: SessionState;
  readonly backTranslate: boolean;
  readonly sentencesTranslated: number;
  readonly fragmentsReceived: number;
  readonly unitsEmitted: number;
  readonly createdAt: number;
  readonly updatedAt: number;
  /** Milliseconds from session start to the first generated unit, if any */
  readonly firstUnitLatencyMs: number | null;
  readonly error: Error | null;
}

/**
 * Thrown on a transition the phase machine does not allow. Indicates a bug
 * in the orchestrator, not bad input.
 */
export class InvalidTransitionError extends Error {
  constructor(from: SessionState, to: SessionState) {
    super(`Invalid session transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class StreamSession {
  readonly sessionId: string;
  readonly backTranslate: boolean;

  private state: SessionState = "CREATED";
  private readonly listeners: Set<SessionStateListener> = new Set();
  private sentencesTranslated = 0;
  private fragmentsReceived = 0;
  private unitsEmitted = 0;
  private readonly createdAt: number;
  private updatedAt: number;
  private firstUnitAt: number | null = null;
  private error: Error | null = null;

  constructor(options?: Readonly<StreamSessionOptions>) {
    this.sessionId = options?.sessionId ?? generateId("session");
    this.backTranslate = options?.backTranslate ?? false;
    this.createdAt = getTimestamp();
    this.updatedAt = this.createdAt;
  }

  get currentState(): SessionState {
    return this.state;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATES.has(this.state);
  }

  addStateListener(listener: SessionStateListener): void {
    this.listeners.add(listener);
  }

  removeStateListener(listener: SessionStateListener): void {
    this.listeners.delete(listener);
  }

  /**
   * Move to the next phase.
   *
   * @throws InvalidTransitionError when the phase machine does not allow it
   */
  enter(phase: PipelinePhase): void {
    if (!TRANSITIONS[this.state].includes(phase)) {
      throw new InvalidTransitionError(this.state, phase);
    }
    this.transition(phase);
  }

  fail(error: Error): void {
    if (this.isTerminal) {
      return;
    }
    this.error = error;
    this.transition("FAILED");
  }

  cancel(): void {
    if (this.isTerminal) {
      return;
    }
    this.error = new PipelineCancelledError(this.sessionId);
    this.transition("CANCELLED");
  }

  recordSentence(): void {
    this.sentencesTranslated++;
    this.touch();
  }

  recordFragment(): void {
    this.fragmentsReceived++;
    this.touch();
  }

  recordUnit(): void {
    this.unitsEmitted++;
    this.touch();
    if (this.firstUnitAt === null) {
      this.firstUnitAt = this.updatedAt;
    }
  }

  getSessionInfo(): SessionInfo {
    return {
      sessionId: this.sessionId,
      state: this.state,
      backTranslate: this.backTranslate,
      sentencesTranslated: this.sentencesTranslated,
      fragmentsReceived: this.fragmentsReceived,
      unitsEmitted: this.unitsEmitted,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
      firstUnitLatencyMs:
        this.firstUnitAt === null ? null : this.firstUnitAt - this.createdAt,
      error: this.error,
    };
  }

  private transition(to: SessionState): void {
    const from = this.state;
    this.state = to;
    this.touch();

    const change: SessionStateChange = {
      sessionId: this.sessionId,
      from,
      to,
      timestamp: this.updatedAt,
    };
    for (const listener of this.listeners) {
      listener(change);
    }
  }

  private touch(): void {
    this.updatedAt = getTimestamp();
  }
}

export function createStreamSession(
  options?: Readonly<StreamSessionOptions>
): StreamSession {
  return new StreamSession(options);
}
