import { createHash } from 'node:crypto';

const FINGERPRINT_PATTERN = /^[0-9a-f]{64}$/;

/** Upper-case and strip all whitespace, so "abc 123" and "ABC123" register as the same plate. */
export const normalizePlate = (plate: string): string => plate.trim().toUpperCase().replace(/\s+/g, '');

/** SHA-256 hex digest of the normalized plate. The raw plate is never stored. */
export const fingerprintPlate = (plate: string): string =>
  createHash('sha256').update(normalizePlate(plate), 'utf8').digest('hex');

export const isWellFormedFingerprint = (value: string): boolean => FINGERPRINT_PATTERN.test(value);
