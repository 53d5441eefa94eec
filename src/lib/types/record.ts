export interface TicketFields {
  readonly eventName: string;
  readonly city: string;
  readonly eventDate: string | null; // YYYY-MM-DD
  readonly area: string;
  readonly price: string;
  readonly quantity: string;
  readonly contact: string;
  readonly notes: string;
}

export type ClassificationVerdict =
  | { matched: false }
  | { matched: true; fields: TicketFields };

export interface ExtractedRecord extends TicketFields {
  readonly id: string;
  readonly taskId: number;
  readonly documentId: string;
  readonly documentUrl: string;
  readonly createdAt: Date;
}

export interface RecordQuery {
  taskId?: number;
  limit?: number;
}
