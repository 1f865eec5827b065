/**
 * Process-wide client handle, built on first use.
 *
 * A factory that throws (missing credentials, bad region) marks the handle
 * unavailable for the life of the process; construction is never retried.
 */

export type HandleResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

type HandleState<T> =
  | { status: 'pending' }
  | { status: 'ready'; value: T }
  | { status: 'unavailable'; reason: string };

export class LazyHandle<T> {
  private state: HandleState<T> = { status: 'pending' };

  constructor(readonly name: string, private readonly factory: () => T) {}

  static unavailable<T>(name: string, reason: string): LazyHandle<T> {
    return new LazyHandle<T>(name, () => {
      throw new Error(reason);
    });
  }

  get(): HandleResult<T> {
    if (this.state.status === 'pending') {
      try {
        this.state = { status: 'ready', value: this.factory() };
        console.log(`[Services] ${this.name} client initialized`);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.state = { status: 'unavailable', reason };
        console.warn(`[Services] ${this.name} unavailable: ${reason}`);
      }
    }

    if (this.state.status === 'ready') {
      return { ok: true, value: this.state.value };
    }
    if (this.state.status === 'unavailable') {
      return { ok: false, reason: this.state.reason };
    }
    return { ok: false, reason: `${this.name} not initialized` };
  }

  get status(): HandleState<T>['status'] {
    return this.state.status;
  }
}
