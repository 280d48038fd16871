/**
 * DocumentWorker - worker thread script for parallel document parsing
 *
 * Receives: { source, origin } - one range of a multi-document stream
 * Returns: { values } - the parsed document roots, or the error as JSON
 */

import { parentPort } from 'worker_threads';
import type { Value } from '@yamlet/types';
import { Composer } from '../composer/Composer.js';
import { YamletError } from '../errors/YamletError.js';
import type { YamletErrorJSON } from '../errors/YamletError.js';
import { Scanner } from '../scanner/Scanner.js';
import { nullValue } from '../values/Value.js';
import type { WorkerRequest } from './DocumentWorkerPool.js';

function parseRange(source: string, origin: { offset: number; line: number }): Value[] {
  const events = new Scanner(source, { origin }).events();
  const values: Value[] = [];
  for (const document of new Composer().compose(events)) {
    values.push(document.root ?? nullValue());
  }
  return values;
}

function toErrorJSON(error: unknown): YamletErrorJSON {
  if (error instanceof YamletError) {
    return error.toJSON();
  }
  return {
    name: error instanceof Error ? error.name : 'Error',
    code: 'ERR_WORKER_CRASHED',
    severity: 'error',
    message: error instanceof Error ? error.message : String(error),
    context: {},
  };
}

// Listen for messages from main thread
const port = parentPort;
if (port) {
  port.on('message', (msg: WorkerRequest) => {
    if (msg.type === 'parse') {
      try {
        const values = parseRange(msg.source, msg.origin);
        port.postMessage({ type: 'result', taskId: msg.taskId, values });
      } catch (error) {
        port.postMessage({ type: 'error', taskId: msg.taskId, error: toErrorJSON(error) });
      }
    } else if (msg.type === 'exit') {
      process.exit(0);
    }
  });

  // Signal ready
  port.postMessage({ type: 'ready' });
}
