import { v1 as uuidv1 } from 'uuid'

/**
 * Generate the token shared by every row of one uniqueness attempt.
 *
 * Time-based (v1) UUIDs embed a 100ns clock reading plus a per-process clock
 * sequence, so tokens stay distinct across attempts from the same caller.
 */
export function generateProbeToken(): string {
  return uuidv1()
}
