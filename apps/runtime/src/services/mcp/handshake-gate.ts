import { NotInitializedError } from '@runtime/core/errors';
import type { GateState } from '@runtime/core/interfaces';

/**
 * Initialize-before-use state machine.
 *
 *   uninitialized --begin--> initializing --complete--> ready
 *         ^                        |
 *         +---------fail-----------+
 *
 * `ready` is the only state in which gated operations are accepted.
 * begin() is also legal from `ready`: a repeated handshake is not cached.
 */
export class HandshakeGate {
  private _state: GateState = 'uninitialized';

  get state(): GateState {
    return this._state;
  }

  get isReady(): boolean {
    return this._state === 'ready';
  }

  begin(): void {
    this._state = 'initializing';
  }

  complete(): void {
    if (this._state !== 'initializing') {
      throw new Error(`Cannot complete handshake from state "${this._state}"`);
    }
    this._state = 'ready';
  }

  fail(): void {
    this._state = 'uninitialized';
  }

  reset(): void {
    this._state = 'uninitialized';
  }

  /**
   * Local check only; never touches the transport.
   */
  assertReady(operation: string): void {
    if (this._state !== 'ready') {
      throw new NotInitializedError(operation);
    }
  }
}
