import type { GroupId, UserId } from '../types/ids.js';
import { type Cancelable, scheduleOnce } from '../util/delayed.js';
import { log } from '../util/logger.js';

interface LiveSession<TContext> {
  readonly groupId: GroupId;
  readonly userId: UserId;
  readonly context: TContext;
  readonly token: number;
  readonly expiry: Cancelable;
}

export interface ImmersiveSessionTableOptions {
  readonly onExpire?: ((groupId: GroupId, userId: UserId) => void) | undefined;
}

// JSON keeps the pair unambiguous even when ids contain separators.
export const sessionKey = (groupId: GroupId, userId: UserId): string =>
  JSON.stringify([groupId, userId]);

/**
 * One follow-up slot per (group, user). Every method is synchronous, which makes
 * each call a critical section on the event loop: a session is either live or
 * gone, and only the newest `arm` for a key can ever be consumed or expire.
 */
export class ImmersiveSessionTable<TContext extends object> {
  private readonly logger = log.child({ component: 'sessions' });
  private readonly sessions = new Map<string, LiveSession<TContext>>();
  private seq = 0;

  constructor(private readonly options: ImmersiveSessionTableOptions = {}) {}

  public get size(): number {
    return this.sessions.size;
  }

  public has(groupId: GroupId, userId: UserId): boolean {
    return this.sessions.has(sessionKey(groupId, userId));
  }

  public arm(groupId: GroupId, userId: UserId, context: TContext, ttlMs: number): number {
    const key = sessionKey(groupId, userId);
    const prior = this.sessions.get(key);
    if (prior) {
      prior.expiry.cancel();
      this.sessions.delete(key);
    }

    this.seq += 1;
    const token = this.seq;
    const expiry = scheduleOnce(ttlMs, () => this.expire(key, token));
    this.sessions.set(key, { groupId, userId, context, token, expiry });
    this.logger.debug('session.armed', { groupId, userId, token, ttlMs, replaced: !!prior });
    return token;
  }

  /** Takes the live session's context, leaving nothing behind. */
  public tryConsume(groupId: GroupId, userId: UserId): TContext | undefined {
    const key = sessionKey(groupId, userId);
    const session = this.sessions.get(key);
    if (!session) return undefined;
    session.expiry.cancel();
    this.sessions.delete(key);
    this.logger.debug('session.consumed', { groupId, userId, token: session.token });
    return session.context;
  }

  public invalidate(groupId: GroupId, userId: UserId): boolean {
    const key = sessionKey(groupId, userId);
    const session = this.sessions.get(key);
    if (!session) return false;
    session.expiry.cancel();
    this.sessions.delete(key);
    this.logger.debug('session.invalidated', { groupId, userId, token: session.token });
    return true;
  }

  public clear(): void {
    for (const session of this.sessions.values()) session.expiry.cancel();
    this.sessions.clear();
  }

  private expire(key: string, token: number): void {
    const session = this.sessions.get(key);
    if (!session || session.token !== token) return;
    this.sessions.delete(key);
    this.logger.debug('session.expired', {
      groupId: session.groupId,
      userId: session.userId,
      token,
    });
    this.options.onExpire?.(session.groupId, session.userId);
  }
}
