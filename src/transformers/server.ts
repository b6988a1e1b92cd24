/**
 * Server transformer - converts SRV answers to ServerRecord DTOs.
 */
import type { ServerRecord } from '../types/dto.js';
import type { SrvAnswer } from '../discovery/types.js';

/**
 * Transform an SRV answer to a ServerRecord.
 * @param answer SRV answer from the resolver
 * @returns ServerRecord DTO
 */
export function transformServer(answer: SrvAnswer): ServerRecord {
  return {
    target: answer.target,
    port: answer.port,
    priority: answer.priority,
    weight: answer.weight,
  };
}

/**
 * Total order over servers: priority, weight, target, port (all ascending).
 */
export function compareServers(a: ServerRecord, b: ServerRecord): number {
  if (a.priority !== b.priority) {
    return a.priority - b.priority;
  }
  if (a.weight !== b.weight) {
    return a.weight - b.weight;
  }
  if (a.target !== b.target) {
    return a.target < b.target ? -1 : 1;
  }
  return a.port - b.port;
}

/**
 * Transform and sort SRV answers.
 * The result depends only on record contents, not on answer order.
 */
export function transformServers(answers: SrvAnswer[]): ServerRecord[] {
  return answers.map(transformServer).sort(compareServers);
}
