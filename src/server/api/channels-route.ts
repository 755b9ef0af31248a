import { Router } from 'express';
import { z } from 'zod';
import type { BrokerContext } from './types.js';

const registerBodySchema = z.object({
  clientName: z.string().trim().min(1),
  channelUri: z.string().url(),
  machineName: z.string().trim().default(''),
  registeredAt: z.union([z.number(), z.string().datetime()]).optional()
});

export function makeChannelsRoute(ctx: BrokerContext): Router {
  const router = Router();

  router.post('/channels/register', (req, res) => {
    const parsed = registerBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({
        ok: false,
        error: {
          code: 'invalid_params',
          message: 'clientName and a valid channelUri are required'
        }
      });
    }

    const now = ctx.clock.now();
    const { clientName, channelUri, machineName, registeredAt } = parsed.data;
    const at = typeof registeredAt === 'string' ? Date.parse(registeredAt) : registeredAt ?? now;
    ctx.channelRegistry.register(clientName, channelUri, machineName, at, now);
    return res.json({ ok: true, clientName });
  });

  router.get('/channels', (_req, res) => {
    res.json({ channels: ctx.channelRegistry.summarize() });
  });

  router.delete('/channels/:clientName', (req, res) => {
    const removed = ctx.channelRegistry.unregister(req.params.clientName);
    if (removed) ctx.logger.info({ clientName: req.params.clientName }, 'push channel removed');
    res.json({ ok: true, removed });
  });

  return router;
}
