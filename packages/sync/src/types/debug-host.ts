/**
 * A stack frame as the sync engine sees it.
 * @public
 */
export interface FrameInfo {
  /** Position in the call stack; 0 is the innermost frame */
  index: number;

  /** Host-assigned frame id, passed back to {@link DebugSessionHost.evaluate} */
  id: number;

  /**
   * Address of the frame's current instruction as already known by the host.
   * Only outer frames rely on it; the innermost frame is read live.
   */
  instructionPointerReference?: string;
}

/**
 * What the sync engine needs from the debugger integration.
 *
 * Implementations wrap a concrete debugger client (see DapSessionHost) or a
 * fake in tests.
 * @public
 */
export interface DebugSessionHost {
  /** Stable identifier of the debugging session */
  readonly id: string;

  /** Currently selected frame, if the debuggee is stopped */
  getCurrentFrame(): FrameInfo | undefined;

  /**
   * Evaluates `expression` (e.g. `$rip`) in the context of `frameId`.
   * Rejects when the debugger reports an error.
   */
  evaluate(expression: string, frameId: number): Promise<string>;
}
