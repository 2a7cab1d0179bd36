import {
  DuplicateGatewayCallIdError,
  DuplicateSessionError,
  NotFoundError,
  VersionConflictError,
} from './errors';
import { parseSessionRecord } from './sessionSchema';
import { cloneSession, type CallSession, type GatewayCallId, type SessionId } from './types';

/**
 * Durable home of Call Session records. compareAndSwap is the only mutation
 * path after create; it also binds gatewayCallId -> sessionId the first time
 * a record carries a gateway call id.
 */
export interface SessionStore {
  create(session: CallSession): Promise<CallSession>;
  compareAndSwap(sessionId: SessionId, expectedVersion: number, next: CallSession): Promise<CallSession>;
  get(sessionId: SessionId): Promise<CallSession>;
  getByGatewayCallId(gatewayCallId: GatewayCallId): Promise<CallSession>;
}

export class InMemorySessionStore implements SessionStore {
  private readonly records = new Map<SessionId, string>();
  private readonly gatewayIndex = new Map<GatewayCallId, SessionId>();

  public async create(session: CallSession): Promise<CallSession> {
    if (this.records.has(session.sessionId)) {
      throw new DuplicateSessionError(session.sessionId);
    }
    if (session.gatewayCallId) {
      this.assertIndexFree(session.gatewayCallId, session.sessionId);
    }

    const stored: CallSession = { ...cloneSession(session), version: 1 };
    if (stored.gatewayCallId) {
      this.gatewayIndex.set(stored.gatewayCallId, stored.sessionId);
    }
    this.records.set(stored.sessionId, JSON.stringify(stored));
    return cloneSession(stored);
  }

  public async compareAndSwap(
    sessionId: SessionId,
    expectedVersion: number,
    next: CallSession,
  ): Promise<CallSession> {
    const current = this.read(sessionId);
    if (current.version !== expectedVersion) {
      throw new VersionConflictError(sessionId, expectedVersion, current.version);
    }
    if (next.gatewayCallId && next.gatewayCallId !== current.gatewayCallId) {
      this.assertIndexFree(next.gatewayCallId, sessionId);
    }

    const stored: CallSession = { ...cloneSession(next), sessionId, version: expectedVersion + 1 };
    if (stored.gatewayCallId) {
      this.gatewayIndex.set(stored.gatewayCallId, sessionId);
    }
    this.records.set(sessionId, JSON.stringify(stored));
    return cloneSession(stored);
  }

  public async get(sessionId: SessionId): Promise<CallSession> {
    return this.read(sessionId);
  }

  public async getByGatewayCallId(gatewayCallId: GatewayCallId): Promise<CallSession> {
    const sessionId = this.gatewayIndex.get(gatewayCallId);
    if (!sessionId) {
      throw new NotFoundError('gateway call', gatewayCallId);
    }
    return this.read(sessionId);
  }

  public size(): number {
    return this.records.size;
  }

  private read(sessionId: SessionId): CallSession {
    const raw = this.records.get(sessionId);
    if (!raw) {
      throw new NotFoundError('session', sessionId);
    }
    return parseSessionRecord(raw);
  }

  private assertIndexFree(gatewayCallId: GatewayCallId, sessionId: SessionId): void {
    const owner = this.gatewayIndex.get(gatewayCallId);
    if (owner && owner !== sessionId) {
      throw new DuplicateGatewayCallIdError(gatewayCallId, owner);
    }
  }
}
