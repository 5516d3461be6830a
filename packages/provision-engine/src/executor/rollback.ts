/**
 * Single-use cleanup bound to a scope
 *
 * Create the guard right after acquiring a resource, call `disarm()` on
 * the success path only, and `release()` in a `finally` block. The action
 * runs exactly when the scope is left without `disarm()`.
 */
export class RollbackGuard {
  private status: 'armed' | 'disarmed' | 'fired' = 'armed';

  constructor(
    private readonly action: () => Promise<void>,
    private readonly onError: (error: unknown) => void
  ) {}

  get armed(): boolean {
    return this.status === 'armed';
  }

  get fired(): boolean {
    return this.status === 'fired';
  }

  disarm(): void {
    if (this.status === 'armed') this.status = 'disarmed';
  }

  /**
   * Run the action if still armed. Errors go to `onError` so they never
   * replace the error that is unwinding the scope.
   */
  async release(): Promise<void> {
    if (this.status !== 'armed') return;
    this.status = 'fired';
    try {
      await this.action();
    } catch (error) {
      this.onError(error);
    }
  }
}
