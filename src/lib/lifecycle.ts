import { ClosedError, NotInitializedError } from './errors';

export type LifecycleState = 'uninitialized' | 'ready' | 'closed';

/**
 * Uninitialized -> Ready -> Closed. Public operations of a stateful
 * component call `assertReady` first and fail fast outside `ready`.
 */
export abstract class Lifecycle {
  private lifecycleState: LifecycleState = 'uninitialized';

  protected constructor(private readonly componentName: string) {}

  get state(): LifecycleState {
    return this.lifecycleState;
  }

  async init(): Promise<void> {
    if (this.lifecycleState === 'ready') return;
    if (this.lifecycleState === 'closed') throw new ClosedError(this.componentName);
    await this.onInit();
    this.lifecycleState = 'ready';
  }

  async close(): Promise<void> {
    if (this.lifecycleState === 'closed') return;
    const wasReady = this.lifecycleState === 'ready';
    this.lifecycleState = 'closed';
    if (wasReady) await this.onClose();
  }

  protected assertReady(): void {
    if (this.lifecycleState === 'uninitialized') throw new NotInitializedError(this.componentName);
    if (this.lifecycleState === 'closed') throw new ClosedError(this.componentName);
  }

  protected async onInit(): Promise<void> {}

  protected async onClose(): Promise<void> {}
}
