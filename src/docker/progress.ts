/**
 * BuildKit `--progress=plain` parsing.
 *
 * Plain progress prints one record per line, keyed by vertex number:
 *
 *   #7 [builder  3/12] RUN apt-get update ...
 *   #7 0.412 Get:1 http://deb.debian.org/debian bookworm InRelease
 *   #7 DONE 14.2s
 *   #8 [builder  4/12] ADD https://astral.sh/uv/install.sh /uv-installer.sh
 *   #8 CACHED
 *   #9 ERROR: process "/bin/sh -c ..." did not complete successfully: exit code: 1
 */

import { vertexMap } from "../dockerfile-gen.js";
import type { ImageStage } from "../pipeline/types.js";

export type ProgressEvent =
  | { type: "step-start"; vertex: number; stage: string; position: number; total: number; instruction: string }
  | { type: "step-cached"; vertex: number }
  | { type: "step-done"; vertex: number; seconds: number }
  | { type: "step-error"; vertex: number; message: string; exitCode?: number }
  | { type: "log"; vertex?: number; text: string };

const START = /^#(\d+) \[([^\]\s]+) +(\d+)\/(\d+)\] (.*)$/;
const CACHED = /^#(\d+) CACHED$/;
const DONE = /^#(\d+) DONE (\d+(?:\.\d+)?)s$/;
const ERROR = /^#(\d+) ERROR: (.*)$/;
const OUTPUT = /^#(\d+) (?:\d+\.\d+ )?(.*)$/;

export function parseProgressLine(line: string): ProgressEvent {
  const text = line.trimEnd();

  const start = START.exec(text);
  if (start) {
    return {
      type: "step-start",
      vertex: Number(start[1]),
      stage: start[2] ?? "",
      position: Number(start[3]),
      total: Number(start[4]),
      instruction: start[5] ?? "",
    };
  }

  const cached = CACHED.exec(text);
  if (cached) {
    return { type: "step-cached", vertex: Number(cached[1]) };
  }

  const done = DONE.exec(text);
  if (done) {
    return { type: "step-done", vertex: Number(done[1]), seconds: Number(done[2]) };
  }

  const error = ERROR.exec(text);
  if (error) {
    const message = error[2] ?? "";
    const exitCode = /exit code: (\d+)/.exec(message)?.[1];
    return exitCode === undefined
      ? { type: "step-error", vertex: Number(error[1]), message }
      : { type: "step-error", vertex: Number(error[1]), message, exitCode: Number(exitCode) };
  }

  const output = OUTPUT.exec(text);
  if (output) {
    return { type: "log", vertex: Number(output[1]), text: output[2] ?? "" };
  }
  return { type: "log", text };
}

/** A progress event resolved to a step of the tracked stage. */
export type StepEvent =
  | { type: "start"; step: string }
  | { type: "done"; step: string; cached: boolean }
  | { type: "error"; step: string | undefined; message: string; exitCode?: number };

/**
 * Resolves BuildKit vertices to the steps of one stage.
 *
 * Vertices of other stages (the builder's, replayed from cache during a
 * runtime build) are ignored.
 */
export class ProgressTracker {
  private readonly positions: Map<number, string>;
  private readonly vertices = new Map<number, string | undefined>();
  private readonly started = new Set<string>();
  private readonly finished = new Set<string>();
  private lastError: { step: string | undefined; message: string; exitCode?: number } | undefined;

  constructor(private readonly stage: ImageStage) {
    this.positions = vertexMap(stage);
  }

  /** Feed one output line; returns the step event it produced, if any. */
  handle(line: string): StepEvent | undefined {
    const event = parseProgressLine(line);

    switch (event.type) {
      case "step-start": {
        if (event.stage !== this.stage.name) {
          return undefined;
        }
        const step = this.positions.get(event.position);
        this.vertices.set(event.vertex, step);
        if (step === undefined || this.started.has(step)) {
          return undefined;
        }
        this.started.add(step);
        return { type: "start", step };
      }
      case "step-cached":
      case "step-done": {
        const step = this.vertices.get(event.vertex);
        if (step === undefined || this.finished.has(step)) {
          return undefined;
        }
        this.finished.add(step);
        return { type: "done", step, cached: event.type === "step-cached" };
      }
      case "step-error": {
        if (!this.vertices.has(event.vertex)) {
          return undefined;
        }
        const step = this.vertices.get(event.vertex);
        const error = { step, message: event.message, exitCode: event.exitCode };
        this.lastError = error;
        return { type: "error", ...error };
      }
      case "log":
        return undefined;
    }
  }

  /** The most recent error attributed to this stage, if any. */
  get error(): { step: string | undefined; message: string; exitCode?: number } | undefined {
    return this.lastError;
  }

  isFinished(step: string): boolean {
    return this.finished.has(step);
  }
}
