import { log } from '../log';
import { getRedisClient, type RedisClient } from '../redis/client';
import { NotFoundError } from '../survey/errors';
import { newParticipant, ParticipantSchema, type Contact, type Participant } from './participants';

export interface ParticipantStore {
  /** Adds a contact, or refreshes number and schedule while keeping attempt history. */
  upsertContact(contact: Contact): Promise<Participant>;
  get(participantId: string): Promise<Participant>;
  list(): Promise<Participant[]>;
  save(participant: Participant): Promise<void>;
}

function mergeContact(existing: Participant | undefined, contact: Contact): Participant {
  if (!existing) {
    return newParticipant(contact);
  }
  return { ...existing, phoneE164: contact.phoneE164, scheduledAt: contact.scheduledAt };
}

export class InMemoryParticipantStore implements ParticipantStore {
  private readonly records = new Map<string, Participant>();

  public async upsertContact(contact: Contact): Promise<Participant> {
    const next = mergeContact(this.records.get(contact.participantId), contact);
    this.records.set(next.participantId, { ...next });
    return { ...next };
  }

  public async get(participantId: string): Promise<Participant> {
    const record = this.records.get(participantId);
    if (!record) {
      throw new NotFoundError('participant', participantId);
    }
    return { ...record };
  }

  public async list(): Promise<Participant[]> {
    return [...this.records.values()].map((record) => ({ ...record }));
  }

  public async save(participant: Participant): Promise<void> {
    this.records.set(participant.participantId, { ...participant });
  }
}

function parseParticipant(raw: string): Participant | undefined {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    log.warn({ event: 'participant_record_invalid', err: error }, 'participant record is not json');
    return undefined;
  }
  const parsed = ParticipantSchema.safeParse(decoded);
  if (!parsed.success) {
    log.warn({ event: 'participant_record_invalid', issues: parsed.error.issues.length }, 'participant record invalid');
    return undefined;
  }
  return parsed.data;
}

/** All participants live in one hash: `${prefix}:participants`, field = participant id. */
export class RedisParticipantStore implements ParticipantStore {
  private readonly key: string;
  private readonly redis: RedisClient;

  constructor(options: { prefix: string; redis?: RedisClient }) {
    this.key = `${options.prefix}:participants`;
    this.redis = options.redis ?? getRedisClient();
  }

  public async upsertContact(contact: Contact): Promise<Participant> {
    const raw = await this.redis.hget(this.key, contact.participantId);
    const existing = raw ? parseParticipant(raw) : undefined;
    const next = mergeContact(existing, contact);
    await this.save(next);
    return next;
  }

  public async get(participantId: string): Promise<Participant> {
    const raw = await this.redis.hget(this.key, participantId);
    const participant = raw ? parseParticipant(raw) : undefined;
    if (!participant) {
      throw new NotFoundError('participant', participantId);
    }
    return participant;
  }

  public async list(): Promise<Participant[]> {
    const all = await this.redis.hgetall(this.key);
    const participants: Participant[] = [];
    for (const raw of Object.values(all)) {
      const participant = parseParticipant(raw);
      if (participant) {
        participants.push(participant);
      }
    }
    return participants.sort((a, b) => a.participantId.localeCompare(b.participantId));
  }

  public async save(participant: Participant): Promise<void> {
    await this.redis.hset(this.key, participant.participantId, JSON.stringify(participant));
  }
}
