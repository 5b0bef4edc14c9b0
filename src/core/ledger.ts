import type { MessageId } from "../types/brands";
import { fromUtf8 } from "../utils/bytes";
import { JournaledMap, type Journal } from "./journal";
import { ErrorState, type FailedMessage, type FailureRecord, type InboundMessage } from "./types";

/**
 * Inbound messages whose application failed. A record's presence is the
 * only "pending recovery" signal; absence means never failed or recovered.
 */
export class FailureLedger {
  private readonly records: JournaledMap<MessageId, FailureRecord>;

  constructor(journal: Journal) {
    this.records = new JournaledMap(journal);
  }

  get size(): number {
    return this.records.size;
  }

  record(message: InboundMessage, reason: Uint8Array): void {
    this.records.set(message.messageId, { messageId: message.messageId, reason, message });
  }

  updateReason(id: MessageId, reason: Uint8Array): void {
    const rec = this.records.get(id);
    if (rec) this.records.set(id, { ...rec, reason });
  }

  get(id: MessageId): FailureRecord | undefined {
    return this.records.get(id);
  }

  has(id: MessageId): boolean {
    return this.records.has(id);
  }

  clear(id: MessageId): boolean {
    return this.records.delete(id);
  }

  errorStateOf(id: MessageId): ErrorState {
    return this.records.has(id) ? ErrorState.BASIC : ErrorState.RESOLVED;
  }

  reasonText(id: MessageId): string | undefined {
    const rec = this.records.get(id);
    return rec && fromUtf8(rec.reason);
  }

  list(offset = 0, limit = Number.MAX_SAFE_INTEGER): FailedMessage[] {
    return [...this.records.keys()]
      .slice(offset, offset + limit)
      .map((messageId) => ({ messageId, errorCode: ErrorState.BASIC }));
  }
}
