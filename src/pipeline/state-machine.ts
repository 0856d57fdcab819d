/**
 * Pipeline state machine.
 *
 * States advance strictly in order; any non-terminal state may fail.
 */

import { PipelineStateError } from "../errors.js";
import { PipelineState } from "./types.js";

/** The single legal successor of each non-terminal state (besides Failed). */
export const TRANSITIONS: ReadonlyMap<PipelineState, PipelineState> = new Map([
  [PipelineState.PENDING, PipelineState.BASE_BUILDER],
  [PipelineState.BASE_BUILDER, PipelineState.DEPS_INSTALLED],
  [PipelineState.DEPS_INSTALLED, PipelineState.SOURCE_COPIED],
  [PipelineState.SOURCE_COPIED, PipelineState.ENV_SYNCED],
  [PipelineState.ENV_SYNCED, PipelineState.BASE_RUNTIME],
  [PipelineState.BASE_RUNTIME, PipelineState.USER_CREATED],
  [PipelineState.USER_CREATED, PipelineState.OWNERSHIP_SET],
  [PipelineState.OWNERSHIP_SET, PipelineState.IDENTITY_SWITCHED],
  [PipelineState.IDENTITY_SWITCHED, PipelineState.ARTIFACTS_COPIED],
  [PipelineState.ARTIFACTS_COPIED, PipelineState.PATH_CONFIGURED],
  [PipelineState.PATH_CONFIGURED, PipelineState.SOURCE_RECOPIED],
  [PipelineState.SOURCE_RECOPIED, PipelineState.COMPLETED],
]);

export function isTerminalState(state: PipelineState): boolean {
  return state === PipelineState.COMPLETED || state === PipelineState.FAILED;
}

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  if (isTerminalState(from)) {
    return false;
  }
  return to === PipelineState.FAILED || TRANSITIONS.get(from) === to;
}

export type StateListener = (from: PipelineState, to: PipelineState) => void;

export class PipelineStateMachine {
  private current: PipelineState = PipelineState.PENDING;
  private readonly visited: PipelineState[] = [PipelineState.PENDING];

  constructor(private readonly listener?: StateListener) {}

  get state(): PipelineState {
    return this.current;
  }

  /** Every state entered so far, starting with Pending. */
  get history(): readonly PipelineState[] {
    return [...this.visited];
  }

  get isTerminal(): boolean {
    return isTerminalState(this.current);
  }

  /** @throws PipelineStateError when `to` is not the legal next state. */
  advance(to: PipelineState): void {
    if (!canTransition(this.current, to)) {
      throw new PipelineStateError(`Illegal transition ${this.current} -> ${to}`);
    }
    const from = this.current;
    this.current = to;
    this.visited.push(to);
    this.listener?.(from, to);
  }

  /** Enter Failed. A no-op once already failed. */
  fail(): void {
    if (this.current === PipelineState.FAILED) {
      return;
    }
    this.advance(PipelineState.FAILED);
  }
}
