/**
 * Store interfaces.
 *
 * The orchestrator only ever writes to an IInteractionLog, and never
 * waits on it. Reading runs back (IRunReader) is for the CLI.
 */

import type { IterationRecord } from "../consortium/types.js";
import type {
  RunStart,
  RunFinish,
  RunSummary,
  RunDetail,
  ConsortiumPreset,
  SavedConsortium,
} from "./types.js";

/** Append-only sink for orchestration runs. Records arrive in round order. */
export interface IInteractionLog {
  beginRun(run: RunStart): Promise<void>;
  append(runId: string, record: IterationRecord): Promise<void>;
  finishRun(runId: string, outcome: RunFinish): Promise<void>;
}

export interface IRunReader {
  listRuns(limit?: number): Promise<RunSummary[]>;
  getRun(id: string): Promise<RunDetail | null>;
}

export interface IConsortiumStore {
  /** Insert or replace. */
  saveConsortium(name: string, preset: ConsortiumPreset): Promise<SavedConsortium>;
  getConsortium(name: string): Promise<SavedConsortium | null>;
  listConsortiums(): Promise<SavedConsortium[]>;
  removeConsortium(name: string): Promise<boolean>;
}

export interface IStore extends IInteractionLog, IRunReader, IConsortiumStore {
  initialize(): Promise<void>;
  close(): Promise<void>;
}
