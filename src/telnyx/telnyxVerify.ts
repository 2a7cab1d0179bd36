import crypto from 'crypto';

const MAX_SKEW_SECONDS = 300;

export interface TelnyxVerifyConfig {
  /** ed25519 public key: PEM, hex or base64 DER. */
  publicKey?: string;
  /** Shared secret for HMAC-SHA256 signed webhooks. */
  webhookSecret?: string;
  skipVerification?: boolean;
}

export interface TelnyxSignatureInput {
  rawBody: Buffer;
  signature: string;
  timestamp: string;
  scheme?: 'ed25519' | 'hmac-sha256';
  nowSeconds?: number;
}

export interface TelnyxEventMeta {
  eventType?: string;
  callControlId?: string;
}

export interface TelnyxSignatureCheck {
  ok: boolean;
  skipped: boolean;
}

function isHex(value: string): boolean {
  return /^[0-9a-f]+$/i.test(value);
}

function parsePublicKey(publicKey: string): crypto.KeyObject {
  if (publicKey.includes('BEGIN PUBLIC KEY')) {
    return crypto.createPublicKey(publicKey);
  }

  const keyBuffer = Buffer.from(publicKey, isHex(publicKey) ? 'hex' : 'base64');
  return crypto.createPublicKey({ key: keyBuffer, format: 'der', type: 'spki' });
}

function getString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function getField(value: unknown, key: string): unknown {
  if (!value || typeof value !== 'object' || !(key in value)) {
    return undefined;
  }
  return Object.getOwnPropertyDescriptor(value, key)?.value;
}

/** Best-effort event type and call id for log lines; never throws. */
export function extractTelnyxEventMeta(rawBody: Buffer): TelnyxEventMeta {
  if (rawBody.length === 0) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody.toString('utf8'));
  } catch {
    return {};
  }

  const data = getField(parsed, 'data');
  return {
    eventType: getString(getField(data, 'event_type')),
    callControlId: getString(getField(getField(data, 'payload'), 'call_control_id')),
  };
}

function verifyHmacSignature(message: Buffer, signature: string, secret: string): boolean {
  const digest = crypto.createHmac('sha256', secret).update(message).digest();
  const signatureBuffer = Buffer.from(signature, isHex(signature) ? 'hex' : 'base64');

  if (signatureBuffer.length !== digest.length) {
    return false;
  }

  return crypto.timingSafeEqual(digest, signatureBuffer);
}

export function verifyTelnyxSignature(
  { rawBody, signature, timestamp, scheme, nowSeconds }: TelnyxSignatureInput,
  config: TelnyxVerifyConfig,
): TelnyxSignatureCheck {
  if (config.skipVerification) {
    return { ok: true, skipped: true };
  }

  const trimmedSignature = signature.trim();
  const trimmedTimestamp = timestamp.trim();
  if (!trimmedSignature || !trimmedTimestamp) {
    return { ok: false, skipped: false };
  }

  const parsedTimestamp = Number.parseInt(trimmedTimestamp, 10);
  if (!Number.isFinite(parsedTimestamp)) {
    return { ok: false, skipped: false };
  }

  const now = nowSeconds ?? Math.floor(Date.now() / 1000);
  const normalizedTimestamp = parsedTimestamp > 1_000_000_000_000 ? Math.floor(parsedTimestamp / 1000) : parsedTimestamp;
  if (Math.abs(now - normalizedTimestamp) > MAX_SKEW_SECONDS) {
    return { ok: false, skipped: false };
  }

  const message = Buffer.concat([Buffer.from(trimmedTimestamp, 'utf8'), Buffer.from('.', 'utf8'), rawBody]);

  const secret = config.webhookSecret?.trim();
  const shouldUseHmac = scheme === 'hmac-sha256' || (!!secret && scheme !== 'ed25519');

  try {
    if (shouldUseHmac) {
      if (!secret) {
        return { ok: false, skipped: false };
      }
      return { ok: verifyHmacSignature(message, trimmedSignature, secret), skipped: false };
    }

    const publicKeyRaw = config.publicKey?.trim();
    if (!publicKeyRaw) {
      return { ok: false, skipped: false };
    }

    const publicKey = parsePublicKey(publicKeyRaw);
    const signatureBuffer = Buffer.from(trimmedSignature, isHex(trimmedSignature) ? 'hex' : 'base64');
    return { ok: crypto.verify(null, message, publicKey, signatureBuffer), skipped: false };
  } catch {
    return { ok: false, skipped: false };
  }
}
