import { errorFields, log } from './logger.js';

export interface Stoppable {
  stop(): void | Promise<void>;
}

/** Owns the process-wide abort signal and the ordered shutdown sequence. */
export class Lifecycle {
  private readonly logger = log.child({ component: 'lifecycle' });
  private readonly controller = new AbortController();
  private shuttingDown = false;

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  public get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  public async shutdown(options: {
    reason?: string | undefined;
    stop?: readonly Stoppable[] | undefined;
    drain?: readonly (() => Promise<void>)[] | undefined;
    drainTimeoutMs?: number | undefined;
  }): Promise<void> {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    const reason = options.reason ?? 'shutdown';
    this.logger.info('shutdown.begin', { reason });

    // Stop accepting new work.
    for (const s of options.stop ?? []) {
      try {
        await s.stop();
      } catch (err) {
        this.logger.warn('stop.failed', errorFields(err));
      }
    }

    this.controller.abort(reason);

    const drains = (options.drain ?? []).map((d) =>
      d().catch((err: unknown) => {
        this.logger.warn('drain.failed', errorFields(err));
      }),
    );
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = await Promise.race([
      Promise.all(drains).then(() => false),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(true), Math.max(0, options.drainTimeoutMs ?? 10_000));
      }),
    ]);
    clearTimeout(timer);
    if (timedOut) this.logger.warn('drain.timeout', { reason });
    this.logger.info('shutdown.done', { reason });
  }
}
