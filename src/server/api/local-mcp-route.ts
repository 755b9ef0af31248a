import { Router } from 'express';
import { BrokerError, describeCause, type BrokerErrorCode } from '../errors.js';
import type { BrokerContext } from './types.js';

interface RpcBody {
  method?: unknown;
  params?: unknown;
}

const HTTP_STATUS_BY_CODE: Record<BrokerErrorCode, number> = {
  credential_failed: 502,
  notify_failed: 502,
  connect_timeout: 504,
  transport_not_ready: 504,
  handshake_failed: 502,
  rpc_failed: 502,
  cancelled: 499
};

function isParams(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function makeLocalMcpRoute(ctx: BrokerContext): Router {
  const router = Router();

  router.post('/local-mcp/:clientName/rpc', async (req, res) => {
    const clientName = req.params.clientName.trim();
    const body: RpcBody = isParams(req.body) ? req.body : {};
    const method = typeof body.method === 'string' ? body.method.trim() : '';
    const params = body.params ?? {};

    if (!clientName || !method || !isParams(params)) {
      return res.status(400).json({
        ok: false,
        error: {
          code: 'invalid_params',
          message: 'method is required and params must be an object'
        }
      });
    }

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const { session, reply } = await ctx.sessionBroker.sendMcpRequest(clientName, method, params, controller.signal);
      return res.json({ ok: true, sessionId: session.sessionId, requestId: reply.id, reply });
    } catch (error) {
      if (error instanceof BrokerError) {
        return res.status(HTTP_STATUS_BY_CODE[error.code]).json({
          ok: false,
          error: {
            code: error.code,
            phase: error.phase,
            message: error.message
          }
        });
      }

      ctx.logger.error({ clientName, method, err: describeCause(error) }, 'local mcp request failed');
      return res.status(500).json({
        ok: false,
        error: {
          code: 'internal_error',
          message: 'internal error'
        }
      });
    }
  });

  router.get('/local-mcp/sessions', (_req, res) => {
    const sessions = ctx.sessionBroker.listSessions().map((s) => ({
      ...s,
      state: ctx.sessionBroker.getBringUpState(s.clientName)
    }));
    res.json({ sessions });
  });

  router.delete('/local-mcp/sessions/:clientName', (req, res) => {
    const evicted = ctx.sessionBroker.evict(req.params.clientName);
    res.json({ ok: true, evicted });
  });

  return router;
}
