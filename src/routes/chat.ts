import express, { Router } from 'express';
import { z } from 'zod';
import type { DialogueOrchestrator } from '../dialogue/orchestrator';
import { log } from '../log';
import { asyncRoute, getRequestId, parseBody } from './middleware';

const MAX_AUDIO_BYTES = '10mb';

const nonBlankText = z.string().refine((value) => value.trim() !== '', { message: 'Text cannot be empty' });
const sessionId = z.string().trim().min(1).max(128).optional();

const TextInputSchema = z.object({
  text: nonBlankText,
  session_id: sessionId,
});

const SpeakInputSchema = z.object({
  text: nonBlankText,
});

const ResetInputSchema = z.object({
  session_id: sessionId,
});

/** JSON web surface: chat, speech and conversation reset. */
export function createChatRouter(orchestrator: DialogueOrchestrator): Router {
  const router = Router();

  const chatHandler = asyncRoute(async (req, res) => {
    const input = parseBody(TextInputSchema, req, res);
    if (!input) return;

    const result = await orchestrator.chat(input.text, input.session_id);
    log.info(
      { event: 'chat_reply', requestId: getRequestId(req), session_id: input.session_id, source: result.source },
      'chat reply',
    );
    res.json(result);
  });

  router.post('/process', chatHandler);
  router.post('/chat', chatHandler);

  router.post(
    '/speak',
    asyncRoute(async (req, res) => {
      const input = parseBody(SpeakInputSchema, req, res);
      if (!input) return;
      res.json(await orchestrator.speak(input.text));
    }),
  );

  router.post(
    '/listen',
    express.raw({ type: ['audio/*', 'application/octet-stream'], limit: MAX_AUDIO_BYTES }),
    asyncRoute(async (req, res) => {
      const body: unknown = req.body;
      const audio = Buffer.isBuffer(body) ? body : Buffer.alloc(0);
      const contentType = req.header('content-type') ?? 'application/octet-stream';
      res.json(await orchestrator.listen({ audio, contentType }));
    }),
  );

  router.post(
    '/interact',
    asyncRoute(async (req, res) => {
      const input = parseBody(TextInputSchema, req, res);
      if (!input) return;
      res.json(await orchestrator.interact(input.text, input.session_id));
    }),
  );

  router.post(
    '/reset',
    asyncRoute(async (req, res) => {
      const input = parseBody(ResetInputSchema, req, res);
      if (!input) return;
      await orchestrator.reset(input.session_id);
      res.json({ status: 'success', message: 'Conversation reset' });
    }),
  );

  return router;
}
