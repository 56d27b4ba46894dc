/**
 * Instruction discriminators for the memo programs
 * @module program/discriminator
 */

import { createHash } from 'node:crypto';

/**
 * First 8 bytes of sha256("global:" + name), the selector every memo
 * program instruction starts with.
 */
export function instructionDiscriminator(name: string): Buffer {
  return createHash('sha256').update(`global:${name}`).digest().subarray(0, 8);
}
