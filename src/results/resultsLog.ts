import { promises as fs } from 'fs';
import path from 'path';
import Papa from 'papaparse';
import { log } from '../log';
import type { AnswerRecord, CallSession } from '../survey/types';

export const RESULTS_COLUMNS = [
  'timestamp_utc',
  'session_id',
  'participant_id',
  'gateway_call_id',
  'direction',
  'destination',
  'phase',
  'question_index',
  'raw_recording_uri',
  'transcript',
  'detected_language',
  'translated_transcript',
  'synthesized_audio_uri',
  'pipeline_status',
  'failure_reason',
] as const;

export type ResultCell = string | number | undefined;

function answerCells(answer: AnswerRecord | undefined): ResultCell[] {
  if (!answer) {
    return [undefined, undefined, undefined, undefined, undefined, undefined, undefined];
  }
  return [
    answer.questionIndex,
    answer.rawRecordingUri,
    answer.transcript,
    answer.detectedLanguage,
    answer.translatedTranscript,
    answer.synthesizedAudioUri,
    answer.pipelineStatus,
  ];
}

/** One row per answer; a session without answers still gets one row. */
export function buildResultRows(session: CallSession): ResultCell[][] {
  const answers = Object.values(session.answers).sort((a, b) => a.questionIndex - b.questionIndex);
  const targets: Array<AnswerRecord | undefined> = answers.length > 0 ? answers : [undefined];

  return targets.map((answer) => [
    session.endedAt ?? session.updatedAt,
    session.sessionId,
    session.participantId,
    session.gatewayCallId,
    session.direction,
    session.destination ?? session.caller,
    session.phase,
    ...answerCells(answer),
    answer?.failureReason ?? session.failureReason,
  ]);
}

export function formatResultRows(session: CallSession, includeHeader: boolean): string {
  return Papa.unparse(
    { fields: [...RESULTS_COLUMNS], data: buildResultRows(session) },
    { header: includeHeader, newline: '\n' },
  );
}

export class ResultsLog {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  /** Appends are serialized so rows of different sessions never interleave. */
  public append(session: CallSession): Promise<void> {
    const write = this.tail.then(() => this.write(session));
    this.tail = write.catch((error: unknown) => {
      log.error({ event: 'results_log_write_failed', session_id: session.sessionId, err: error }, 'results log write failed');
    });
    return write;
  }

  private async write(session: CallSession): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const exists = await fs
      .stat(this.filePath)
      .then((stats) => stats.size > 0)
      .catch((error: unknown) => {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
          return false;
        }
        throw error;
      });

    await fs.appendFile(this.filePath, `${formatResultRows(session, !exists)}\n`, 'utf8');
    log.info(
      {
        event: 'results_logged',
        session_id: session.sessionId,
        rows: Object.keys(session.answers).length || 1,
        path: this.filePath,
      },
      'survey results logged',
    );
  }
}
