/**
 * JSON shapes on HTTP and WebSocket payloads. Field names follow the storage columns;
 * timestamps travel as ISO-8601 strings.
 */

import { z } from 'zod';
import type { Alert, PlateRegistration } from '../core/types.js';
import type { EntitlementSnapshot } from '../entitlement/entitlementGate.js';
import { decodeResponse, encodeResponse } from './response.js';

const isoTimestamp = z.string().refine((s) => !Number.isNaN(Date.parse(s)), 'invalid timestamp');

export const wireAlertSchema = z.object({
  id: z.string().min(1),
  sender_id: z.string().min(1),
  receiver_id: z.string().min(1),
  plate_hash: z.string().min(1),
  message: z.string().nullable(),
  response: z.string().nullable(),
  response_message: z.string().nullable(),
  created_at: isoTimestamp,
  read_at: isoTimestamp.nullable(),
  response_at: isoTimestamp.nullable(),
  push_sent_at: isoTimestamp.nullable().default(null)
});

export type WireAlert = z.infer<typeof wireAlertSchema>;

const iso = (ms: number): string => new Date(ms).toISOString();
const isoOrNull = (ms: number | null): string | null => (ms === null ? null : iso(ms));
const msOrNull = (s: string | null): number | null => (s === null ? null : Date.parse(s));

export const toWire = (alert: Alert): WireAlert => ({
  id: alert.id,
  sender_id: alert.senderId,
  receiver_id: alert.receiverId,
  plate_hash: alert.plateFingerprint,
  message: alert.message,
  response: alert.response ? encodeResponse(alert.response) : null,
  response_message: alert.responseMessage,
  created_at: iso(alert.createdAt),
  read_at: isoOrNull(alert.readAt),
  response_at: isoOrNull(alert.respondedAt),
  push_sent_at: isoOrNull(alert.pushSentAt)
});

export const fromWire = (row: WireAlert): Alert => ({
  id: row.id,
  senderId: row.sender_id,
  receiverId: row.receiver_id,
  plateFingerprint: row.plate_hash,
  message: row.message,
  response: decodeResponse(row.response),
  responseMessage: row.response_message,
  createdAt: Date.parse(row.created_at),
  readAt: msOrNull(row.read_at),
  respondedAt: msOrNull(row.response_at),
  pushSentAt: msOrNull(row.push_sent_at)
});

export const wirePlateSchema = z.object({
  user_id: z.string().min(1),
  plate_hash: z.string().min(1),
  registered_at: isoTimestamp
});

export type WirePlate = z.infer<typeof wirePlateSchema>;

export const toWirePlate = (plate: PlateRegistration): WirePlate => ({
  user_id: plate.ownerUserId,
  plate_hash: plate.plateFingerprint,
  registered_at: iso(plate.registeredAt)
});

export const fromWirePlate = (row: WirePlate): PlateRegistration => ({
  ownerUserId: row.user_id,
  plateFingerprint: row.plate_hash,
  registeredAt: Date.parse(row.registered_at)
});

export const wireEntitlementSchema = z.object({
  user_id: z.string().min(1),
  tier: z.enum(['free', 'premium', 'lifetime']),
  quota: z.number().int().nonnegative(),
  used: z.number().int().nonnegative(),
  remaining: z.number().int().nonnegative(),
  resets_at: isoTimestamp.nullable()
});

export type WireEntitlement = z.infer<typeof wireEntitlementSchema>;

export const toWireEntitlement = (snapshot: EntitlementSnapshot): WireEntitlement => ({
  user_id: snapshot.userId,
  tier: snapshot.tier,
  quota: snapshot.quota,
  used: snapshot.used,
  remaining: snapshot.remaining,
  resets_at: isoOrNull(snapshot.resetsAt)
});

export const fromWireEntitlement = (row: WireEntitlement): EntitlementSnapshot => ({
  userId: row.user_id,
  tier: row.tier,
  quota: row.quota,
  used: row.used,
  remaining: row.remaining,
  resetsAt: msOrNull(row.resets_at)
});
