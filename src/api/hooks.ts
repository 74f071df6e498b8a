/**
 * Repository push hook.
 *
 * POST /hooks/push: accepts a GitHub push delivery and triggers a run for
 * the pushed branch or tag. When a webhook secret is configured, the
 * delivery must carry a valid `X-Hub-Signature-256`.
 *
 * Mounted ahead of the JSON body parser: the signature covers the raw body.
 */

import express, { Router } from 'express';
import { createHmac, timingSafeEqual } from 'crypto';
import { apiError, createTypedError, validationError } from '../domain/errors';
import { triggerFromPushRef } from '../domain/trigger';
import { PipelineOrchestrator } from '../engine/orchestrator';
import { logger } from '../logger';
import { startRun } from './runs';

const log = logger.child({ module: 'api.hooks' });

/** `sha256=<hex>` signature GitHub sends for a payload. */
export function signPayload(secret: string, payload: Buffer | string): string {
  return `sha256=${createHmac('sha256', secret).update(payload).digest('hex')}`;
}

/** Constant-time check of a delivery signature. */
export function verifySignature(secret: string, payload: Buffer, signature: string | undefined): boolean {
  if (!signature) return false;
  const expected = Buffer.from(signPayload(secret, payload));
  const actual = Buffer.from(signature);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

function readPushFields(payload: unknown): { ref?: string; deleted: boolean } {
  if (typeof payload !== 'object' || payload === null) return { deleted: false };
  const ref: unknown = Object.getOwnPropertyDescriptor(payload, 'ref')?.value;
  const deleted: unknown = Object.getOwnPropertyDescriptor(payload, 'deleted')?.value;
  return { ref: typeof ref === 'string' ? ref : undefined, deleted: deleted === true };
}

export function createHookRoutes(orchestrator: PipelineOrchestrator, options: { webhookSecret?: string } = {}): Router {
  const router = Router();

  router.post('/hooks/push', express.raw({ type: '*/*', limit: '5mb' }), async (req, res, next) => {
    try {
      const raw: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

      if (options.webhookSecret) {
        const header = req.headers['x-hub-signature-256'];
        if (!verifySignature(options.webhookSecret, raw, typeof header === 'string' ? header : undefined)) {
          log.warn('Rejected push hook with invalid signature');
          res.status(401).json(
            apiError(
              createTypedError({
                code: 'AUTH.UNAUTHENTICATED',
                message: 'Invalid or missing X-Hub-Signature-256',
              }),
            ),
          );
          return;
        }
      }

      const event = req.headers['x-github-event'];
      if (event === 'ping') {
        res.json({ ok: true });
        return;
      }
      if (typeof event === 'string' && event !== 'push') {
        res.status(202).json({ ignored: true, reason: `Unsupported event "${event}"` });
        return;
      }

      let payload: unknown;
      try {
        payload = JSON.parse(raw.toString('utf8'));
      } catch {
        res.status(400).json(apiError(validationError('Push payload is not valid JSON')));
        return;
      }

      const { ref, deleted } = readPushFields(payload);
      if (!ref) {
        res.status(400).json(apiError(validationError('Push payload has no "ref"')));
        return;
      }
      if (deleted) {
        res.status(202).json({ ignored: true, reason: `Ref ${ref} was deleted` });
        return;
      }
      const trigger = triggerFromPushRef(ref);
      if (!trigger) {
        res.status(202).json({ ignored: true, reason: `Ref ${ref} is neither a branch nor a tag` });
        return;
      }

      const run = await startRun(orchestrator, trigger);
      res.status(201).json({ run });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
