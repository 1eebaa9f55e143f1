import type { Response } from 'express';
import type { SseStreamOptions, SseStream } from '../../shared/sse';
import type { Logger } from '../obs/logger';

export const createSseStream = (res: Response, options: SseStreamOptions, logger?: Logger): SseStream => {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.flushHeaders?.();

  const controller = new AbortController();
  let closed = false;

  const reportSocketError = (action: string, error: unknown) => {
    logger?.debug('SSE socket error', {
      label: options.label,
      action,
      error: error instanceof Error ? error.message : String(error),
    });
  };

  const heartbeat = setInterval(() => {
    if (closed) {
      return;
    }
    try {
      res.write(': heartbeat\n\n');
    } catch (error) {
      reportSocketError('heartbeat', error);
    }
  }, options.heartbeatMs);

  const close = () => {
    if (closed) {
      return;
    }
    closed = true;
    clearInterval(heartbeat);
    controller.abort();
    try {
      res.end();
    } catch (error) {
      reportSocketError('end', error);
    }
    options.onClose?.();
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
    controller,
    send: (event) => writeFrame('stage-event', event),
    sendJson: (eventName, payload) => writeFrame(eventName, payload),
    close,
  };
};
