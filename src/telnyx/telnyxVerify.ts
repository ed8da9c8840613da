import crypto from 'crypto';

const MAX_SKEW_SECONDS = 300;

export const SIGNATURE_HEADER = 'telnyx-signature-ed25519';
export const TIMESTAMP_HEADER = 'telnyx-timestamp';

export interface TelnyxSignatureInput {
  rawBody: Buffer;
  signature: string | undefined;
  timestamp: string | undefined;
  /** Verification is skipped when no key is configured. */
  publicKey: string | undefined;
  nowSeconds?: number;
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
  if (keyBuffer.length === 32) {
    // Raw ed25519 key as shown in the Telnyx portal; wrap it in an SPKI header.
    const spkiPrefix = Buffer.from('302a300506032b6570032100', 'hex');
    return crypto.createPublicKey({ key: Buffer.concat([spkiPrefix, keyBuffer]), format: 'der', type: 'spki' });
  }
  return crypto.createPublicKey({ key: keyBuffer, format: 'der', type: 'spki' });
}

export function verifyTelnyxSignature({
  rawBody,
  signature,
  timestamp,
  publicKey,
  nowSeconds,
}: TelnyxSignatureInput): TelnyxSignatureCheck {
  const publicKeyRaw = publicKey?.trim();
  if (!publicKeyRaw) {
    return { ok: true, skipped: true };
  }

  const trimmedSignature = signature?.trim() ?? '';
  const trimmedTimestamp = timestamp?.trim() ?? '';
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

  const message = Buffer.concat([Buffer.from(`${trimmedTimestamp}|`, 'utf8'), rawBody]);

  try {
    const key = parsePublicKey(publicKeyRaw);
    const signatureBuffer = Buffer.from(trimmedSignature, isHex(trimmedSignature) ? 'hex' : 'base64');
    return { ok: crypto.verify(null, message, key, signatureBuffer), skipped: false };
  } catch {
    // Malformed key or signature bytes.
    return { ok: false, skipped: false };
  }
}
