import type { GroupId } from '../types/ids.js';
import { type Cancelable, scheduleOnce } from '../util/delayed.js';
import { errorFields, log } from '../util/logger.js';
import { ChatBuffer, DEFAULT_BUFFER_MAX_LINES } from './chatBuffer.js';

export type TimerFireHandler = (groupId: GroupId, token: number) => Promise<void>;

interface RunningTimer {
  readonly token: number;
  readonly delayMs: number;
  readonly handle: Cancelable;
  readonly buffer: ChatBuffer;
}

export interface ProactiveTimerTableOptions {
  readonly bufferMaxLines?: number | undefined;
}

/**
 * One debounce timer per group plus the transcript collected while it runs.
 * `restart` cancels the old timer and clears its buffer in the same synchronous
 * step, and `drainIfCurrent` only hands lines to the firing that still owns
 * the slot.
 */
export class ProactiveTimerTable {
  private readonly logger = log.child({ component: 'timers' });
  private readonly timers = new Map<GroupId, RunningTimer>();
  private readonly bufferMaxLines: number;
  private seq = 0;

  constructor(options: ProactiveTimerTableOptions = {}) {
    this.bufferMaxLines = options.bufferMaxLines ?? DEFAULT_BUFFER_MAX_LINES;
  }

  public get size(): number {
    return this.timers.size;
  }

  public isRunning(groupId: GroupId): boolean {
    return this.timers.has(groupId);
  }

  public currentToken(groupId: GroupId): number | undefined {
    return this.timers.get(groupId)?.token;
  }

  public restart(groupId: GroupId, delayMs: number, onFire: TimerFireHandler): number {
    this.stop(groupId);

    this.seq += 1;
    const token = this.seq;
    const handle = scheduleOnce(delayMs, () => {
      this.logger.debug('timer.fired', { groupId, token });
      onFire(groupId, token).catch((err: unknown) => {
        this.logger.error('timer.handler_failed', { groupId, token, ...errorFields(err) });
      });
    });
    this.timers.set(groupId, {
      token,
      delayMs,
      handle,
      buffer: new ChatBuffer(this.bufferMaxLines),
    });
    this.logger.debug('timer.armed', { groupId, token, delayMs });
    return token;
  }

  /** Appends only while a timer is running and its buffer has room. */
  public tryAppend(groupId: GroupId, line: string): boolean {
    const timer = this.timers.get(groupId);
    if (!timer) return false;
    const accepted = timer.buffer.push(line);
    if (!accepted) this.logger.debug('buffer.full', { groupId, token: timer.token });
    return accepted;
  }

  /**
   * Removes the timer and returns its lines if `token` still owns the slot.
   * A superseded or cancelled firing gets `undefined`.
   */
  public drainIfCurrent(groupId: GroupId, token: number): string[] | undefined {
    const timer = this.timers.get(groupId);
    if (!timer || timer.token !== token) return undefined;
    this.timers.delete(groupId);
    timer.handle.cancel();
    return timer.buffer.drain();
  }

  public cancel(groupId: GroupId): boolean {
    const stopped = this.stop(groupId);
    if (stopped) this.logger.debug('timer.cancelled', { groupId });
    return stopped;
  }

  public cancelAll(): void {
    for (const timer of this.timers.values()) {
      timer.handle.cancel();
      timer.buffer.clear();
    }
    this.timers.clear();
  }

  private stop(groupId: GroupId): boolean {
    const timer = this.timers.get(groupId);
    if (!timer) return false;
    timer.handle.cancel();
    timer.buffer.clear();
    this.timers.delete(groupId);
    return true;
  }
}
