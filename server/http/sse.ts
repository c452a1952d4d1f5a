import type { Response } from 'express';
import type { SseStream, SseStreamOptions } from '../../shared/sse';

/**
 * Wrap an express response as a server-sent event stream. Writes after the
 * client disconnects are dropped; a failed write closes the stream.
 */
export const createSseStream = (res: Response, options: SseStreamOptions): SseStream => {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.flushHeaders();

  let closed = false;

  const writeRaw = (chunk: string): boolean => {
    if (closed || res.writableEnded || res.destroyed) {
      return false;
    }
    res.write(chunk);
    return true;
  };

  const close = () => {
    if (closed) {
      return;
    }
    closed = true;
    clearInterval(heartbeat);
    if (!res.writableEnded) {
      res.end();
    }
    options.onClose?.();
  };

  const heartbeat = setInterval(() => {
    writeRaw(': heartbeat\n\n');
  }, options.heartbeatMs);

  res.on('close', close);

  const writeFrame = (eventName: string, payload: unknown) => {
    const data = typeof payload === 'string' ? payload : JSON.stringify(payload);
    try {
      writeRaw(`event: ${eventName}\ndata: ${data}\n\n`);
    } catch (error) {
      close();
      throw error;
    }
  };

  return {
    send: (event) => writeFrame('stage-event', event),
    sendJson: (eventName, payload) => writeFrame(eventName, payload),
    close,
    isClosed: () => closed,
  };
};
