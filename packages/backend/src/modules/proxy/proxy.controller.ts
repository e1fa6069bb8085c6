import type { Request, Response } from 'express';
import { chatCompletionRequestSchema } from '@kiro-bridge/shared';
import type { GatewayService } from './proxy.service.js';
import { ClientDisconnectError } from './errors.js';
import { OpenAIChunkEncoder, SSE_DONE_LINE, createCompletionId, formatSSE } from './openai-stream.js';
import { toErrorPayload } from '../../middlewares/error.middleware.js';
import { logger } from '../../lib/logger.js';

/**
 * 客户端断开时中止上游请求
 */
function abortOnClose(res: Response): AbortController {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller;
}

export class ProxyController {
  constructor(private readonly gateway: GatewayService) {}

  listModels = async (_req: Request, res: Response): Promise<void> => {
    res.json(await this.gateway.getModelCatalog());
  };

  chatCompletions = async (req: Request, res: Response): Promise<void> => {
    const request = chatCompletionRequestSchema.parse(req.body);
    const abort = abortOnClose(res);

    if (!request.stream) {
      const completion = await this.gateway.complete(request, { signal: abort.signal });
      res.json(completion);
      return;
    }

    // 出错时还没写响应头，由 errorHandler 返回 JSON 错误
    const chunks = await this.gateway.streamCompletion(request, { signal: abort.signal });

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    const encoder = new OpenAIChunkEncoder({
      id: createCompletionId(),
      created: Math.floor(Date.now() / 1000),
      model: request.model,
    });

    try {
      for await (const chunk of chunks) {
        if (abort.signal.aborted) break;
        res.write(formatSSE(encoder.encode(chunk)));
      }
      if (!abort.signal.aborted) {
        res.write(SSE_DONE_LINE);
      }
    } catch (error) {
      if (abort.signal.aborted || error instanceof ClientDisconnectError) {
        logger.info('Client disconnected during stream');
      } else {
        // 响应头已发送，错误以 SSE 帧返回
        const { body } = toErrorPayload(error);
        logger.error({ err: error }, 'Stream failed after headers were sent');
        res.write(formatSSE(body));
        res.write(SSE_DONE_LINE);
      }
    } finally {
      res.end();
    }
  };
}
