import { type Clock, nextTimestamp, systemClock } from "../shared/date-utils";
import type { SettingsChanges, SystemSettings } from "../shared/types";
import { validateHours } from "../shared/validation";
import { numeric, object, text, textList } from "../store/fields";
import type { RecordStore, StoredRecord } from "../store/record-store";

const COLLECTION = "settings";

export const SETTINGS_ID = "system_settings";

export const DEFAULT_LOG_EDIT_TIME_LIMIT_HOURS = 24;
export const DEFAULT_LEAVE_TYPES = ["Sick Leave", "Vacation", "Personal", "Maternity/Paternity"];
export const DEFAULT_TASK_CATEGORIES = [
  "Development",
  "Testing",
  "Documentation",
  "Meetings",
  "Research",
];

function defaultSettings(now: string): SystemSettings {
  return {
    id: SETTINGS_ID,
    logEditTimeLimitHours: DEFAULT_LOG_EDIT_TIME_LIMIT_HOURS,
    defaultLeaveTypes: [...DEFAULT_LEAVE_TYPES],
    defaultTaskCategories: [...DEFAULT_TASK_CATEGORIES],
    notificationSettings: {},
    createdAt: now,
    updatedAt: now,
  };
}

export function decodeSettings(row: StoredRecord): SystemSettings {
  return {
    id: text(row, "id", SETTINGS_ID),
    logEditTimeLimitHours: numeric(row, "log_edit_time_limit_hours", DEFAULT_LOG_EDIT_TIME_LIMIT_HOURS),
    defaultLeaveTypes: textList(row, "default_leave_types", DEFAULT_LEAVE_TYPES),
    defaultTaskCategories: textList(row, "default_task_categories", DEFAULT_TASK_CATEGORIES),
    notificationSettings: object(row, "notification_settings"),
    createdAt: text(row, "created_at"),
    updatedAt: text(row, "updated_at"),
  };
}

export function encodeSettings(settings: SystemSettings): StoredRecord {
  return {
    id: settings.id,
    log_edit_time_limit_hours: settings.logEditTimeLimitHours,
    default_leave_types: settings.defaultLeaveTypes,
    default_task_categories: settings.defaultTaskCategories,
    notification_settings: settings.notificationSettings,
    created_at: settings.createdAt,
    updated_at: settings.updatedAt,
  };
}

/** The settings collection always holds exactly one record once touched. */
export class SettingsRepository {
  constructor(
    private readonly store: RecordStore,
    private readonly clock: Clock = systemClock
  ) {}

  async get(): Promise<SystemSettings> {
    const rows = await this.store.read(COLLECTION);
    if (rows.length > 0) {
      return decodeSettings(rows[0]);
    }

    return this.store.scopedExclusive(COLLECTION, async (section) => {
      const current = await section.read();
      if (current.length > 0) {
        return decodeSettings(current[0]);
      }
      const settings = defaultSettings(this.clock().toISOString());
      await section.write([encodeSettings(settings)]);
      return settings;
    });
  }

  async update(changes: SettingsChanges): Promise<SystemSettings> {
    if (changes.logEditTimeLimitHours !== undefined) {
      validateHours(changes.logEditTimeLimitHours, "logEditTimeLimitHours");
    }

    return this.store.scopedExclusive(COLLECTION, async (section) => {
      const rows = await section.read();
      const current =
        rows.length > 0 ? decodeSettings(rows[0]) : defaultSettings(this.clock().toISOString());

      const next = { ...current };
      if (changes.logEditTimeLimitHours !== undefined) {
        next.logEditTimeLimitHours = changes.logEditTimeLimitHours;
      }
      if (changes.defaultLeaveTypes !== undefined) {
        next.defaultLeaveTypes = [...changes.defaultLeaveTypes];
      }
      if (changes.defaultTaskCategories !== undefined) {
        next.defaultTaskCategories = [...changes.defaultTaskCategories];
      }
      if (changes.notificationSettings !== undefined) {
        next.notificationSettings = changes.notificationSettings;
      }
      next.updatedAt = nextTimestamp(this.clock(), current.updatedAt);

      await section.write([{ ...(rows[0] ?? {}), ...encodeSettings(next) }]);
      return next;
    });
  }
}
