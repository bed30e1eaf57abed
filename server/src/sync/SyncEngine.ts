import { EventEmitter } from 'events';
import { errorMessage } from './errors';

export interface SyncEngineEvents<TTick> {
  started: () => void;
  tick: (tick: TTick) => void;
  failed: (error: unknown) => void;
  stopped: (reason: string) => void;
}

type EngineState = 'idle' | 'starting' | 'running';

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

/**
 * Background loop shared by the audio and screen engines.
 *
 * `start()` opens the capture resource and spawns the loop; `stop()` sets a
 * flag checked at the top of every iteration and resolves only after any
 * pending start has settled, the loop has exited and `release()` has run.
 */
export abstract class SyncEngine<TTick> extends EventEmitter {
  protected abstract readonly tag: string;

  private state: EngineState = 'idle';
  private loop: Promise<void> | null = null;
  private starting: Promise<void> | null = null;
  private stopRequested = false;

  isRunning(): boolean {
    return this.state !== 'idle';
  }

  start(): Promise<void> {
    if (this.starting) {
      return this.starting;
    }
    if (this.state !== 'idle') {
      return Promise.resolve();
    }

    const starting = this.openAndRun().finally(() => {
      this.starting = null;
    });
    this.starting = starting;
    return starting;
  }

  async stop(): Promise<void> {
    this.stopRequested = true;

    const starting = this.starting;
    if (starting) {
      try {
        await starting;
      } catch (error) {
        // start() rejects to its own caller
        console.warn(`[${this.tag}] Start aborted: ${errorMessage(error)}`);
      }
    }
    if (this.loop) {
      await this.loop;
    }
  }

  protected emitTick(tick: TTick): void {
    this.emit('tick', tick);
  }

  /**
   * Acquire the capture resource. Errors abort `start()`.
   */
  protected abstract open(): Promise<void>;

  /**
   * One iteration: capture, compute, push, then wait or yield.
   */
  protected abstract tick(): Promise<void>;

  /**
   * Release the capture resource. Runs on every loop exit path.
   */
  protected abstract release(): void;

  private async openAndRun(): Promise<void> {
    this.state = 'starting';
    this.stopRequested = false;

    try {
      await this.open();
    } catch (error) {
      this.state = 'idle';
      throw error;
    }

    if (this.stopRequested) {
      this.release();
      this.state = 'idle';
      console.log(`[${this.tag}] Stopped before the loop began`);
      return;
    }

    this.state = 'running';
    this.loop = this.runLoop();
    this.emit('started');
    console.log(`[${this.tag}] Started`);
  }

  private async runLoop(): Promise<void> {
    let reason = 'Stopped by user';

    try {
      while (!this.stopRequested) {
        await this.tick();
      }
    } catch (error) {
      reason = errorMessage(error);
      console.error(`[${this.tag}] Loop failed:`, reason);
      this.emit('failed', error);
    } finally {
      this.release();
      this.loop = null;
      this.state = 'idle';
      this.emit('stopped', reason);
      console.log(`[${this.tag}] Stopped (${reason})`);
    }
  }
}
