// src/http/clientAbort.ts

import type { Response } from 'express';

/**
 * Signal that aborts if the client goes away before the response is written.
 *
 * Listens on the response rather than the request: the request's "close"
 * event also fires once its body has been consumed.
 */
export function abortOnClientDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();

  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort(new Error('Client disconnected'));
    }
  });

  return controller.signal;
}
