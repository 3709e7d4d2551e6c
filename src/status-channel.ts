import { EventEmitter } from 'node:events';

export type StatusListener<T> = (state: T) => void;

/**
 * Holds the latest state of a long-running task and fans each change out
 * to subscribers. Late subscribers see only changes published after they
 * join; `current` gives them the state as of now.
 */
export class StatusChannel<T> {
  private readonly emitter = new EventEmitter();
  private state: T;

  constructor(initial: T) {
    this.state = initial;
    this.emitter.setMaxListeners(0);
  }

  get current(): T {
    return this.state;
  }

  publish(next: T): void {
    this.state = next;
    this.emitter.emit('status', next);
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: StatusListener<T>): () => void {
    this.emitter.on('status', listener);
    return () => {
      this.emitter.off('status', listener);
    };
  }

  /** Resolves with the first published state matching the predicate. */
  waitFor(predicate: (state: T) => boolean): Promise<T> {
    if (predicate(this.state)) return Promise.resolve(this.state);
    return new Promise(resolve => {
      const unsubscribe = this.subscribe(state => {
        if (predicate(state)) {
          unsubscribe();
          resolve(state);
        }
      });
    });
  }
}
