import { log } from '../log';
import { getRedisClient, type RedisClient } from '../redis/client';
import {
  DuplicateGatewayCallIdError,
  DuplicateSessionError,
  NotFoundError,
  VersionConflictError,
} from './errors';
import { parseSessionRecord } from './sessionSchema';
import type { SessionStore } from './sessionStore';
import type { CallSession, GatewayCallId, SessionId } from './types';

const LUA_CREATE_SCRIPT = `
local sessionKey = KEYS[1]
local indexKey = KEYS[2]

local record = ARGV[1]
local sessionId = ARGV[2]
local bindIndex = ARGV[3]

if redis.call('EXISTS', sessionKey) == 1 then
  return 'duplicate_session'
end

if bindIndex == '1' then
  local owner = redis.call('GET', indexKey)
  if owner and owner ~= sessionId then
    return 'duplicate_gateway_call_id'
  end
  redis.call('SET', indexKey, sessionId)
end

redis.call('SET', sessionKey, record)
return 'OK'
`;

const LUA_CAS_SCRIPT = `
local sessionKey = KEYS[1]
local indexKey = KEYS[2]

local expectedVersion = tonumber(ARGV[1])
local record = ARGV[2]
local sessionId = ARGV[3]
local bindIndex = ARGV[4]

local current = redis.call('GET', sessionKey)
if not current then
  return 'not_found'
end

local decoded = cjson.decode(current)
if tonumber(decoded['version']) ~= expectedVersion then
  return 'version_conflict'
end

if bindIndex == '1' then
  local owner = redis.call('GET', indexKey)
  if owner and owner ~= sessionId then
    return 'duplicate_gateway_call_id'
  end
  redis.call('SET', indexKey, sessionId)
end

redis.call('SET', sessionKey, record)
return 'OK'
`;

type ScriptName = 'create' | 'cas';

const SCRIPTS: Record<ScriptName, string> = {
  create: LUA_CREATE_SCRIPT,
  cas: LUA_CAS_SCRIPT,
};

export interface RedisSessionStoreOptions {
  prefix: string;
  redis?: RedisClient;
}

export function buildSessionKeys(
  prefix: string,
  sessionId: SessionId,
  gatewayCallId?: GatewayCallId,
): { sessionKey: string; indexKey: string } {
  return {
    sessionKey: `${prefix}:session:${sessionId}`,
    indexKey: `${prefix}:gateway:${gatewayCallId ?? 'unbound'}`,
  };
}

function isNoScriptError(error: unknown): boolean {
  return error instanceof Error && error.message.toUpperCase().includes('NOSCRIPT');
}

export class RedisSessionStore implements SessionStore {
  private readonly prefix: string;
  private readonly redis: RedisClient;
  private readonly scriptShas = new Map<ScriptName, string>();

  constructor(options: RedisSessionStoreOptions) {
    this.prefix = options.prefix;
    this.redis = options.redis ?? getRedisClient();
  }

  public async create(session: CallSession): Promise<CallSession> {
    const stored: CallSession = { ...session, version: 1 };
    const keys = buildSessionKeys(this.prefix, stored.sessionId, stored.gatewayCallId);
    const result = await this.evalScript(
      'create',
      [keys.sessionKey, keys.indexKey],
      [JSON.stringify(stored), stored.sessionId, stored.gatewayCallId ? '1' : '0'],
    );

    switch (result) {
      case 'OK':
        return stored;
      case 'duplicate_session':
        throw new DuplicateSessionError(stored.sessionId);
      case 'duplicate_gateway_call_id':
        throw new DuplicateGatewayCallIdError(stored.gatewayCallId ?? 'unbound');
      default:
        throw new Error(`session create returned unknown result: ${result}`);
    }
  }

  public async compareAndSwap(
    sessionId: SessionId,
    expectedVersion: number,
    next: CallSession,
  ): Promise<CallSession> {
    const stored: CallSession = { ...next, sessionId, version: expectedVersion + 1 };
    const keys = buildSessionKeys(this.prefix, sessionId, stored.gatewayCallId);
    const result = await this.evalScript(
      'cas',
      [keys.sessionKey, keys.indexKey],
      [expectedVersion.toString(), JSON.stringify(stored), sessionId, stored.gatewayCallId ? '1' : '0'],
    );

    switch (result) {
      case 'OK':
        return stored;
      case 'not_found':
        throw new NotFoundError('session', sessionId);
      case 'version_conflict':
        throw new VersionConflictError(sessionId, expectedVersion);
      case 'duplicate_gateway_call_id':
        throw new DuplicateGatewayCallIdError(stored.gatewayCallId ?? 'unbound');
      default:
        throw new Error(`session compare-and-swap returned unknown result: ${result}`);
    }
  }

  public async get(sessionId: SessionId): Promise<CallSession> {
    const { sessionKey } = buildSessionKeys(this.prefix, sessionId);
    const raw = await this.redis.get(sessionKey);
    if (!raw) {
      throw new NotFoundError('session', sessionId);
    }
    return parseSessionRecord(raw);
  }

  public async getByGatewayCallId(gatewayCallId: GatewayCallId): Promise<CallSession> {
    const { indexKey } = buildSessionKeys(this.prefix, '', gatewayCallId);
    const sessionId = await this.redis.get(indexKey);
    if (!sessionId) {
      throw new NotFoundError('gateway call', gatewayCallId);
    }
    return this.get(sessionId);
  }

  private async evalScript(name: ScriptName, keys: string[], args: string[]): Promise<string> {
    const numKeys = keys.length;
    const cachedSha = this.scriptShas.get(name);

    if (cachedSha) {
      try {
        return String(await this.redis.evalsha(cachedSha, numKeys, ...keys, ...args));
      } catch (error) {
        if (!isNoScriptError(error)) {
          throw error;
        }
      }
    }

    try {
      const loadedSha = String(await this.redis.script('LOAD', SCRIPTS[name]));
      this.scriptShas.set(name, loadedSha);
      return String(await this.redis.evalsha(loadedSha, numKeys, ...keys, ...args));
    } catch (error) {
      log.warn({ err: error, event: 'session_script_fallback', script: name }, 'session script evalsha failed');
      return String(await this.redis.eval(SCRIPTS[name], numKeys, ...keys, ...args));
    }
  }
}
