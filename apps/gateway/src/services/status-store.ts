import { z } from "zod";
import { StoreUnavailableError } from "../errors.js";
import { log } from "../logger.js";
import type { KeyValueStore } from "../store/key-value-store.js";
import { keys } from "../store/keys.js";
import { paginate } from "../domain/utils/pagination.js";
import {
  NOTIFICATION_STATUSES,
  NOTIFICATION_TYPES,
  type NotificationStatusRecord,
  type StatusUpdate,
} from "../types/index.js";

const statusRecordSchema = z.object({
  notification_id: z.string(),
  status: z.enum(NOTIFICATION_STATUSES),
  notification_type: z.enum(NOTIFICATION_TYPES),
  user_id: z.string(),
  template_code: z.string(),
  created_at: z.string(),
  updated_at: z.string().optional(),
  error_message: z.string().nullable().optional(),
});

export interface StatusPage {
  items: NotificationStatusRecord[];
  total: number;
}

/**
 * TTL-bounded status records in the key-value store.
 *
 * Unlike rate limiting, status correctness is load-bearing: every store
 * failure here surfaces as StoreUnavailableError.
 */
export class NotificationStatusStore {
  constructor(
    private readonly store: KeyValueStore,
    private readonly ttlSeconds: number
  ) {}

  async setStatus(record: NotificationStatusRecord): Promise<void> {
    try {
      await this.store.set(
        keys.notificationStatus(record.notification_id),
        JSON.stringify(record),
        this.ttlSeconds
      );
    } catch (error) {
      throw new StoreUnavailableError("status write", error);
    }
  }

  async getStatus(notificationId: string): Promise<NotificationStatusRecord | null> {
    let raw: string | null;
    try {
      raw = await this.store.get(keys.notificationStatus(notificationId));
    } catch (error) {
      throw new StoreUnavailableError("status read", error);
    }

    if (raw === null) {
      return null;
    }

    const record = this.decode(notificationId, raw);
    if (!record) {
      throw new StoreUnavailableError("status decode", new Error(`Undecodable status record ${notificationId}`));
    }
    return record;
  }

  /**
   * Merge `update` into an existing record and refresh its TTL.
   * Never creates a record.
   *
   * @returns the merged record, or null if no record exists
   */
  async updateStatus(
    notificationId: string,
    update: StatusUpdate
  ): Promise<NotificationStatusRecord | null> {
    const current = await this.getStatus(notificationId);
    if (!current) {
      return null;
    }

    const merged: NotificationStatusRecord = { ...current, ...update };
    await this.setStatus(merged);
    return merged;
  }

  /**
   * One page of a user's records, newest first. Records that fail to decode
   * are logged and left out.
   */
  async listForUser(userId: string, page: number, limit: number): Promise<StatusPage> {
    const records: NotificationStatusRecord[] = [];

    try {
      const statusKeys = await this.store.scanKeys(keys.notificationStatusPattern());

      for (const key of statusKeys) {
        const raw = await this.store.get(key);
        if (raw === null) continue; // expired between scan and read

        const record = this.decode(key, raw);
        if (record?.user_id === userId) {
          records.push(record);
        }
      }
    } catch (error) {
      throw new StoreUnavailableError("status listing", error);
    }

    records.sort((a, b) => b.created_at.localeCompare(a.created_at));

    return {
      items: paginate(records, page, limit),
      total: records.length,
    };
  }

  private decode(id: string, raw: string): NotificationStatusRecord | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      log.store.error({ id, error: error instanceof Error ? error.message : String(error) }, "status record is not valid JSON");
      return null;
    }

    const result = statusRecordSchema.safeParse(parsed);
    if (!result.success) {
      log.store.error({ id, issues: result.error.issues.length }, "status record has unexpected shape");
      return null;
    }
    return result.data;
  }
}
