export interface IdempotencyRecordData {
  userId: string;
  token: string;
  orderId: string;
  createdAt: Date;
}

export type ClaimResult =
  | { claimed: true; record: IdempotencyRecordData }
  | { claimed: false; record: IdempotencyRecordData };
