/** Load state of a {@link LazyResource}. */
export type LazyResourceState<T> = { status: 'unloaded' } | { status: 'loaded'; value: T };

/**
 * A resource that is loaded on the first `get()` and kept afterwards.
 * A failed load leaves the resource unloaded, so the next `get()` retries.
 */
export class LazyResource<T> {
  private state: LazyResourceState<T> = { status: 'unloaded' };

  constructor(
    readonly url: string,
    private readonly loadValue: () => T
  ) {}

  get status(): LazyResourceState<T>['status'] {
    return this.state.status;
  }

  get(): T {
    if (this.state.status === 'loaded') return this.state.value;
    const value = this.loadValue();
    this.state = { status: 'loaded', value };
    return value;
  }

  toString(): string {
    return `LazyResource(${JSON.stringify(this.url)})`;
  }
}
