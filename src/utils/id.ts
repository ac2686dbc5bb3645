import { randomBytes, randomUUID } from 'node:crypto';

export function generateInvocationId(): string {
  const now = new Date();
  const date = now.toISOString().slice(0, 10).replace(/-/g, '');
  const rand = randomBytes(3).toString('hex');
  return `inv_${date}_${rand}`;
}

/** Install uuids are random v4 identifiers; the repairer receives this as a collaborator. */
export function generateUuid(): string {
  return randomUUID();
}
