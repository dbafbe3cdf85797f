import { EventEmitter } from 'eventemitter3';

/**
 * All typed events emitted by the coupon pipeline.
 * Keys are event names; values are the listener argument tuples.
 */
export interface AppEvents {
  'batch:started': [
    {
      runId: string;
      collectors: number;
    },
  ];
  'batch:completed': [
    {
      runId: string;
      collected: number;
      posted: number;
      durationMs: number;
      aborted: boolean;
    },
  ];
  'collector:failed': [
    {
      runId: string;
      collector: string;
      error: string;
    },
  ];
  'coupon:persisted': [
    {
      id: number;
      fingerprint: string;
      source: string;
    },
  ];
  'coupon:validated': [
    {
      id: number;
      isValid: boolean;
      message: string | null;
    },
  ];
  'coupon:posted': [
    {
      id: number;
      fingerprint: string;
    },
  ];
  'coupon:notify-failed': [
    {
      id: number;
      error: string;
    },
  ];
  'cleanup:completed': [
    {
      deleted: number;
    },
  ];
}

/**
 * Strongly-typed event emitter. All code should use this singleton
 * rather than creating ad-hoc emitters so that cross-module
 * communication stays in one place and is fully typed.
 */
export class TypedEventEmitter extends EventEmitter<AppEvents> {}

export const eventBus = new TypedEventEmitter();
