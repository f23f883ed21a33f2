export type Tier = 'free' | 'premium' | 'lifetime';

export type ResponseKind = 'moving_now' | 'five_minutes' | 'cant_move' | 'wrong_car';

/**
 * Receiver's reply to an alert. Values written by a newer or older client that this
 * build does not know decode to `unrecognized` rather than failing.
 */
export type AlertResponse =
  | { kind: 'moving_now' }
  | { kind: 'five_minutes' }
  | { kind: 'cant_move' }
  | { kind: 'wrong_car' }
  | { kind: 'unrecognized'; raw: string };

export interface Alert {
  id: string;
  senderId: string;
  receiverId: string;
  plateFingerprint: string;
  message: string | null;
  response: AlertResponse | null;
  responseMessage: string | null;
  createdAt: number;
  readAt: number | null;
  respondedAt: number | null;
  pushSentAt: number | null;
}

export interface NewAlert {
  senderId: string;
  receiverId: string;
  plateFingerprint: string;
  message: string | null;
}

export interface PlateRegistration {
  ownerUserId: string;
  plateFingerprint: string;
  registeredAt: number;
}

export interface EntitlementState {
  userId: string;
  tier: Tier;
  dailyAlertsUsed: number;
  usageWindowStart: number;
}

export interface ConsumeDecision {
  allowed: boolean;
  remaining: number;
  quota: number;
  tier: Tier;
}

export interface UserStats {
  userId: string;
  alertsSent: number;
  responsesGiven: number;
  carsFreed: number;
}

export interface AckMarker {
  alertId: string;
  acknowledged: boolean;
  sentAt: number;
  acknowledgedAt: number | null;
}
