import type { Response } from 'express';
import type { SseStreamOptions, SseStream } from '../../shared/sse';
import type { Logger } from '../obs/logger';

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const createSseStream = (res: Response, options: SseStreamOptions, logger?: Logger): SseStream => {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.flushHeaders?.();

  let closed = false;

  const heartbeat = setInterval(() => {
    if (closed) {
      return;
    }
    try {
      res.write(': heartbeat\n\n');
    } catch (error) {
      logger?.debug('SSE heartbeat write failed', { label: options.label, error: describe(error) });
    }
  }, options.heartbeatMs);

  const close = () => {
    if (closed) {
      return;
    }
    closed = true;
    clearInterval(heartbeat);
    res.end();
  };

  res.on('close', close);

  const writeFrame = (eventName: string, payload: unknown) => {
    if (closed) {
      return;
    }

    const data = typeof payload === 'string' ? payload : JSON.stringify(payload);

    try {
      res.write(`event: ${eventName}\n`);
      res.write(`data: ${data}\n\n`);
    } catch (error) {
      close();
      throw error;
    }
  };

  return {
    send: (event) => writeFrame('stage-event', event),
    sendJson: (eventName, payload) => writeFrame(eventName, payload),
    close,
  };
};
