import type { HitlChoice, Layer, TaskKind } from '../core/types.js';

export interface HitlRequest {
  runId: string;
  taskId: string;
  /** Absent for requests outside a document task, such as contract mediation. */
  kind?: TaskKind;
  /** Layer whose pause raised the request. */
  layer: Layer;
  reasonCode: string;
  attempt: number;
}

/**
 * Turns a pause into CONTINUE or STOP. May be async (interactive prompts).
 * Resolvers holding a terminal expose `close` to release it after a run.
 */
export type HitlResolver = ((request: HitlRequest) => HitlChoice | Promise<HitlChoice>) & {
  close?: () => void;
};
