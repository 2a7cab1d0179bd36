import { z } from 'zod';

export interface TelnyxRequestOptions {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
}

const RecordingUrlsSchema = z
  .object({
    wav: z.string().nullish(),
    mp3: z.string().nullish(),
  })
  .passthrough();

export const TelnyxCallPayloadSchema = z
  .object({
    call_control_id: z.string().min(1),
    client_state: z.string().nullish(),
    direction: z.string().nullish(),
    from: z.string().nullish(),
    to: z.string().nullish(),
    hangup_cause: z.string().nullish(),
    recording_urls: RecordingUrlsSchema.nullish(),
    public_recording_urls: RecordingUrlsSchema.nullish(),
  })
  .passthrough();

export const TelnyxWebhookSchema = z.object({
  data: z.object({
    id: z.string().optional(),
    event_type: z.string().min(1),
    occurred_at: z.string().optional(),
    payload: TelnyxCallPayloadSchema,
  }),
});

export type TelnyxCallPayload = z.infer<typeof TelnyxCallPayloadSchema>;

export const TelnyxDialResponseSchema = z.object({
  data: z
    .object({
      call_control_id: z.string().min(1),
      call_leg_id: z.string().optional(),
    })
    .passthrough(),
});
