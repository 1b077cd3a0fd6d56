import type { Message } from '../types/network.js';
import { generateId } from '../utils/id.js';

export function createMessage(sourceId: string, destinationId: string, payload: string): Message {
  return Object.freeze({
    id: generateId(),
    sourceId,
    destinationId,
    payload,
  });
}
