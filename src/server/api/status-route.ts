import { Router } from 'express';
import { buildBrokerHealthSummary, collectClientStatus } from '../metrics/health.js';
import type { BrokerContext } from './types.js';

export function makeStatusRoute(ctx: BrokerContext): Router {
  const router = Router();
  const clients = () =>
    collectClientStatus(ctx.channelRegistry.list(), ctx.sessionBroker.listSessions(), (name) => ctx.sessionBroker.getBringUpState(name));

  router.get('/status', (_req, res) => {
    res.json(buildBrokerHealthSummary(ctx.getMetrics(), ctx.counters, clients()));
  });

  router.get('/status/clients/:clientName', (req, res) => {
    const client = clients().find((c) => c.clientName === req.params.clientName);
    if (!client) {
      return res.status(404).json({
        ok: false,
        error: {
          code: 'unknown_client',
          message: `no channel or session for '${req.params.clientName}'`
        }
      });
    }
    return res.json(client);
  });

  router.get('/healthz', (_req, res) => {
    res.json({ ok: true, port: ctx.port });
  });
  return router;
}
