import { promises as fs } from 'fs';
import { z } from 'zod';
import type { SessionId, SurveyPhase } from '../survey/types';

const E164_REGEX = /^\+[1-9]\d{1,14}$/;

export type ParticipantStatus = 'pending' | 'in-progress' | 'completed' | 'failed';

export interface Participant {
  participantId: string;
  phoneE164: string;
  status: ParticipantStatus;
  attempts: number;
  scheduledAt?: string;
  lastAttemptAt?: string;
  lastSessionId?: SessionId;
  lastOutcome?: SurveyPhase;
}

export interface CallPolicy {
  maxAttempts: number;
  retryGapMs: number;
}

export const DEFAULT_CALL_POLICY: CallPolicy = {
  maxAttempts: 3,
  retryGapMs: 60 * 60 * 1000,
};

const ContactSchema = z.object({
  participantId: z.string().trim().min(1),
  phoneE164: z.string().trim().regex(E164_REGEX, 'invalid E.164 number'),
  scheduledAt: z.string().datetime({ offset: true }).optional(),
});

export const ContactListSchema = z.array(ContactSchema);
export type Contact = z.infer<typeof ContactSchema>;

export const ParticipantSchema = ContactSchema.extend({
  status: z.enum(['pending', 'in-progress', 'completed', 'failed']),
  attempts: z.number().int().nonnegative(),
  lastAttemptAt: z.string().optional(),
  lastSessionId: z.string().optional(),
  lastOutcome: z
    .enum([
      'dialing',
      'awaiting-answer-recording',
      'answer-recorded',
      'pipeline-processing',
      'question-complete',
      'survey-complete',
      'failed',
      'aborted',
    ])
    .optional(),
});

export function parseContacts(input: unknown): Contact[] {
  const parsed = ContactListSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new Error(`Invalid contacts: ${issues}`);
  }

  const seen = new Set<string>();
  for (const contact of parsed.data) {
    if (seen.has(contact.participantId)) {
      throw new Error(`Invalid contacts: duplicate participantId ${contact.participantId}`);
    }
    seen.add(contact.participantId);
  }
  return parsed.data;
}

export async function loadContactsFile(filePath: string): Promise<Contact[]> {
  const content = await fs.readFile(filePath, 'utf8');
  return parseContacts(JSON.parse(content));
}

export function newParticipant(contact: Contact): Participant {
  return { ...contact, status: 'pending', attempts: 0 };
}

/** Whether the dialer may start another attempt for this participant now. */
export function canCall(participant: Participant, now: Date, policy: CallPolicy = DEFAULT_CALL_POLICY): boolean {
  if (participant.status === 'completed' || participant.status === 'in-progress') {
    return false;
  }
  if (participant.attempts >= policy.maxAttempts) {
    return false;
  }
  if (participant.scheduledAt && Date.parse(participant.scheduledAt) > now.getTime()) {
    return false;
  }
  if (!participant.lastAttemptAt) {
    return true;
  }

  const last = Date.parse(participant.lastAttemptAt);
  if (Number.isNaN(last)) {
    return true;
  }
  return now.getTime() - last >= policy.retryGapMs;
}

export function markAttemptStarted(participant: Participant, now: Date): Participant {
  return {
    ...participant,
    status: 'in-progress',
    attempts: participant.attempts + 1,
    lastAttemptAt: now.toISOString(),
  };
}

/** Folds a finished session's phase into the participant record. */
export function applySessionOutcome(
  participant: Participant,
  sessionId: SessionId,
  phase: SurveyPhase,
  policy: CallPolicy = DEFAULT_CALL_POLICY,
): Participant {
  let status: ParticipantStatus;
  switch (phase) {
    case 'survey-complete':
      status = 'completed';
      break;
    case 'aborted':
      status = 'failed';
      break;
    case 'failed':
      status = participant.attempts >= policy.maxAttempts ? 'failed' : 'pending';
      break;
    default:
      return participant;
  }
  return { ...participant, status, lastSessionId: sessionId, lastOutcome: phase };
}
