import { logEvent } from '@disasm-sync/core';
import type { DebugSessionHost } from './types/index.js';
import type { SyncState } from './session/sync-state.js';

/**
 * Reads `$<register>` on `frameId`. An empty result counts as a failure.
 */
export async function readRegister(
  host: DebugSessionHost,
  register: string,
  frameId: number,
): Promise<string> {
  const value = await host.evaluate(`$${register}`, frameId);
  if (!value) {
    throw new Error(`Register ${register} evaluated to an empty result`);
  }
  return value;
}

export interface RegisterResolverOptions {
  /** Called once per session, when a candidate wins detection */
  onDetected: (register: string) => void;
}

/**
 * Finds which register holds the program counter and reads it.
 *
 * The first candidate whose read *completes* successfully wins and is cached
 * on the session state; it is the only register read afterwards, also by
 * detections that were already running when it won. A failed read of the
 * cached register does not clear the cache.
 * @public
 */
export class RegisterResolver {
  public constructor(private readonly options: RegisterResolverOptions) {}

  /**
   * @returns the program counter value, or undefined when nothing resolved
   *   (read failure, no candidate answered, or the session was reset meanwhile)
   */
  public async resolveProgramCounter(
    host: DebugSessionHost,
    frameId: number,
    state: SyncState,
    candidates: readonly string[],
  ): Promise<string | undefined> {
    const epoch = state.epoch;

    if (state.detectedRegister) {
      const register = state.detectedRegister;
      try {
        const value = await readRegister(host, register, frameId);
        return state.epoch === epoch ? value : undefined;
      } catch (error) {
        // TODO: invalidate the cached register after repeated failures
        logEvent('debug', 'register-resolver:cached-read-failed', {
          sessionId: host.id,
          register,
          error: error instanceof Error ? error.message : String(error),
        });
        return undefined;
      }
    }

    return this.detect(host, frameId, state, candidates, epoch);
  }

  private detect(
    host: DebugSessionHost,
    frameId: number,
    state: SyncState,
    candidates: readonly string[],
    epoch: number,
  ): Promise<string | undefined> {
    return new Promise((resolve) => {
      if (candidates.length === 0) {
        resolve(undefined);
        return;
      }

      let won = false;
      let settled = 0;

      for (const register of candidates) {
        void readRegister(host, register, frameId)
          .then(
            (value) => {
              if (won || state.epoch !== epoch) {
                return;
              }
              // An overlapping detection on this session already picked another register
              if (
                state.detectedRegister !== undefined &&
                state.detectedRegister !== register
              ) {
                return;
              }
              won = true;
              if (state.detectedRegister === undefined) {
                state.detectedRegister = register;
                logEvent('info', 'register-resolver:detected', {
                  sessionId: host.id,
                  register,
                });
                this.options.onDetected(register);
              }
              resolve(value);
            },
            (error: unknown) => {
              logEvent('trace', 'register-resolver:candidate-failed', {
                sessionId: host.id,
                register,
                error: error instanceof Error ? error.message : String(error),
              });
            },
          )
          .finally(() => {
            settled += 1;
            if (settled === candidates.length && !won) {
              resolve(undefined);
            }
          });
      }
    });
  }
}
