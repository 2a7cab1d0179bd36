import express, { Router } from 'express';
import type { GatewayCallback } from '../gateway/types';
import { log } from '../log';
import type { CallbackOutcome } from '../survey/orchestrator';
import { mapTelnyxWebhook } from '../telnyx/events';
import { extractTelnyxEventMeta, verifyTelnyxSignature, type TelnyxVerifyConfig } from '../telnyx/telnyxVerify';

export interface CallbackSink {
  handleGatewayCallback(callback: GatewayCallback): Promise<CallbackOutcome>;
}

function parseJson(rawBody: Buffer): unknown {
  try {
    return JSON.parse(rawBody.toString('utf8'));
  } catch {
    return undefined;
  }
}

/**
 * Telnyx call-control webhook. The body is taken raw so the signature is
 * checked over the exact bytes Telnyx signed; accepted events are acked
 * before the survey engine processes them.
 */
export function createTelnyxWebhookRouter(sink: CallbackSink, verifyConfig: TelnyxVerifyConfig): Router {
  const router = Router();

  router.post('/', express.raw({ type: '*/*', limit: '1mb' }), (req, res) => {
    const requestId = typeof res.locals.requestId === 'string' ? res.locals.requestId : undefined;
    const rawBody: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
    const signatureEd25519 = req.header('telnyx-signature-ed25519');
    const signatureHmac = req.header('telnyx-signature');
    const scheme = signatureEd25519 ? 'ed25519' : signatureHmac ? 'hmac-sha256' : undefined;

    const meta = extractTelnyxEventMeta(rawBody);
    const signatureCheck = verifyTelnyxSignature(
      {
        rawBody,
        signature: signatureEd25519 ?? signatureHmac ?? '',
        timestamp: req.header('telnyx-timestamp') ?? '',
        scheme,
      },
      verifyConfig,
    );

    if (signatureCheck.skipped) {
      log.warn({ requestId, event_type: meta.eventType }, 'telnyx signature check skipped (dev)');
    }

    if (!signatureCheck.ok) {
      log.warn(
        {
          event: 'telnyx_webhook_rejected',
          requestId,
          event_type: meta.eventType,
          call_control_id: meta.callControlId,
        },
        'telnyx webhook signature invalid',
      );
      res.status(401).json({ error: 'invalid_signature' });
      return;
    }

    const mapping = mapTelnyxWebhook(parseJson(rawBody));
    if (mapping.kind === 'ignored') {
      log.info(
        { event: 'telnyx_webhook_ignored', requestId, event_type: mapping.eventType, reason: mapping.reason },
        'telnyx webhook ack',
      );
      res.status(200).json({ ok: true });
      return;
    }

    void sink.handleGatewayCallback(mapping.callback).then((outcome) => {
      log.debug(
        {
          event: 'telnyx_webhook_processed',
          requestId,
          event_type: mapping.eventType,
          call_control_id: mapping.callback.gatewayCallId,
          status: outcome.status,
        },
        'telnyx webhook processed',
      );
    });

    log.info(
      {
        event: 'telnyx_webhook_accepted',
        requestId,
        event_type: mapping.eventType,
        call_control_id: mapping.callback.gatewayCallId,
      },
      'telnyx webhook ack',
    );
    res.status(200).json({ ok: true });
  });

  return router;
}
