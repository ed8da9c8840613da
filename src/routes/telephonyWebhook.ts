import express, { Request, Response, Router } from 'express';
import { z } from 'zod';
import { buildCallScript } from '../calls/callScript';
import { hangup, say, TELEPHONY_PATHS, webhookUrl, type CallInstruction } from '../calls/instructions';
import type { SessionLogContext } from '../calls/sessionManager';
import type { DialogueOrchestrator } from '../dialogue/orchestrator';
import { log } from '../log';
import { SIGNATURE_HEADER, TIMESTAMP_HEADER, verifyTelnyxSignature } from '../telnyx/telnyxVerify';
import { renderTexml, TEXML_CONTENT_TYPE, type TexmlOptions } from '../telnyx/texml';
import { asyncRoute, captureRawBody, getRawBody, getRequestId, parseBody } from './middleware';

export interface TelephonyRouterOptions {
  publicBaseUrl: string;
  agentName: string;
  texml: TexmlOptions;
  /** Webhook signatures are verified only when set. */
  publicKey?: string;
  phoneNumber?: string;
}

const TexmlWebhookSchema = z
  .object({
    CallSid: z.string().trim().min(1).optional(),
    From: z.string().optional(),
    To: z.string().optional(),
    SpeechResult: z.string().optional(),
    CallStatus: z.string().optional(),
    Direction: z.string().optional(),
  })
  .passthrough();

type TexmlWebhookParams = z.infer<typeof TexmlWebhookSchema>;

const PlaceCallSchema = z.object({
  to_number: z.string().trim().min(1, 'to_number is required'),
});

const TERMINAL_CALL_STATUSES = new Set(['completed', 'busy', 'failed', 'no-answer', 'canceled']);

type WebhookHandler = (
  callId: string,
  params: TexmlWebhookParams,
  context: SessionLogContext,
) => Promise<CallInstruction[]>;

/** TeXML webhooks plus the outbound-call JSON endpoints. */
export function createTelephonyRouter(orchestrator: DialogueOrchestrator, options: TelephonyRouterOptions): Router {
  const router = Router();
  const script = buildCallScript(options.agentName);

  router.use(express.urlencoded({ extended: false, verify: captureRawBody }));

  function sendTexml(res: Response, instructions: CallInstruction[]): void {
    res.status(200).type(TEXML_CONTENT_TYPE).send(renderTexml(instructions, options.texml));
  }

  function signatureValid(req: Request): boolean {
    const check = verifyTelnyxSignature({
      rawBody: getRawBody(req),
      signature: req.header(SIGNATURE_HEADER),
      timestamp: req.header(TIMESTAMP_HEADER),
      publicKey: options.publicKey,
    });
    if (!check.ok) {
      log.warn(
        { event: 'telephony_signature_rejected', path: req.path, requestId: getRequestId(req) },
        'telnyx webhook signature rejected',
      );
    }
    return check.ok;
  }

  function texmlRoute(name: string, handler: WebhookHandler) {
    return async (req: Request, res: Response): Promise<void> => {
      if (!signatureValid(req)) {
        res.status(401).json({ error: 'invalid_signature' });
        return;
      }

      const requestId = getRequestId(req);
      const parsed = TexmlWebhookSchema.safeParse(req.body ?? {});
      const params: TexmlWebhookParams = parsed.success ? parsed.data : {};
      const callId = params.CallSid;

      try {
        if (!callId) {
          log.warn({ event: 'telephony_webhook_missing_call_sid', webhook: name, requestId }, 'webhook without CallSid');
          sendTexml(res, [say(script.apology), hangup()]);
          return;
        }
        sendTexml(res, await handler(callId, params, { requestId }));
      } catch (error) {
        // The caller still gets valid markup.
        log.error(
          { event: 'telephony_webhook_failed', webhook: name, call_id: callId, err: error, requestId },
          'telephony webhook failed',
        );
        sendTexml(res, [say(script.apology), hangup()]);
      }
    };
  }

  router.post(
    TELEPHONY_PATHS.voice,
    texmlRoute('voice', (callId, params, context) =>
      orchestrator.onIncomingCall(callId, { from: params.From, to: params.To }, context),
    ),
  );

  router.post(
    TELEPHONY_PATHS.gather,
    texmlRoute('gather', (callId, params, context) =>
      orchestrator.onGatheredSpeech(callId, params.SpeechResult ?? '', context),
    ),
  );

  router.post(
    TELEPHONY_PATHS.silence,
    texmlRoute('silence', (callId, _params, context) => orchestrator.onSilence(callId, context)),
  );

  router.post(
    TELEPHONY_PATHS.outbound,
    texmlRoute('outbound', (callId, params, context) =>
      orchestrator.onOutboundAnswered(callId, { from: params.From, to: params.To }, context),
    ),
  );

  router.post(TELEPHONY_PATHS.events, async (req, res) => {
    if (!signatureValid(req)) {
      res.status(401).json({ error: 'invalid_signature' });
      return;
    }

    const requestId = getRequestId(req);
    const parsed = TexmlWebhookSchema.safeParse(req.body ?? {});
    const callId = parsed.success ? parsed.data.CallSid : undefined;
    const status = parsed.success ? parsed.data.CallStatus?.trim().toLowerCase() : undefined;

    log.info({ event: 'telephony_status_callback', call_id: callId, call_status: status, requestId }, 'call status');

    if (callId && status && TERMINAL_CALL_STATUSES.has(status)) {
      try {
        await orchestrator.onHangup(callId, status, { requestId });
      } catch (error) {
        log.error({ event: 'telephony_hangup_failed', call_id: callId, err: error, requestId }, 'hangup handling failed');
      }
    }
    res.status(204).end();
  });

  router.post(
    '/telephony/call',
    asyncRoute(async (req, res) => {
      if (!orchestrator.features().telephony) {
        res.status(503).json({ error: 'telephony_configuration_missing', message: 'Telnyx is not configured' });
        return;
      }

      const input = parseBody(PlaceCallSchema, req, res);
      if (!input) return;

      const result = await orchestrator.placeOutboundCall(input.to_number);
      res.json({ status: result.status, message: result.message, call_sid: result.call_id });
    }),
  );

  router.get('/telephony/status', (_req, res) => {
    const configured = orchestrator.features().telephony;
    res.json({
      configured,
      phone_number: configured ? options.phoneNumber ?? null : null,
      signature_verification: Boolean(options.publicKey),
      active_calls: orchestrator.activeCallCount(),
      webhooks: {
        voice: webhookUrl(options.publicBaseUrl, 'voice'),
        gather: webhookUrl(options.publicBaseUrl, 'gather'),
        silence: webhookUrl(options.publicBaseUrl, 'silence'),
        outbound: webhookUrl(options.publicBaseUrl, 'outbound'),
        events: webhookUrl(options.publicBaseUrl, 'events'),
      },
    });
  });

  return router;
}
