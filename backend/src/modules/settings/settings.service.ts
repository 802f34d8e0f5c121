import { ValidationError } from "../../utils/errors";
import type { SettingsRepository } from "./settings.repository";
import { AutoquizIntervalSchema, FooterTextSchema } from "./settings.validation";

export const SETTING_DEFAULTS = {
  footer_text: "NEETIQBot",
  footer_enabled: "1",
  autoquiz_enabled: "0",
  autoquiz_interval: "30"
} as const;

export type SettingKey = keyof typeof SETTING_DEFAULTS;

export type Settings = {
  footerText: string;
  footerEnabled: boolean;
  autoquizEnabled: boolean;
  autoquizIntervalMinutes: number;
};

function toSettings(stored: Map<string, string>): Settings {
  const read = (key: SettingKey) => stored.get(key) ?? SETTING_DEFAULTS[key];

  const interval = AutoquizIntervalSchema.safeParse(read("autoquiz_interval"));
  return {
    footerText: read("footer_text"),
    footerEnabled: read("footer_enabled") === "1",
    autoquizEnabled: read("autoquiz_enabled") === "1",
    autoquizIntervalMinutes: interval.success ? interval.data : Number(SETTING_DEFAULTS.autoquiz_interval)
  };
}

/**
 * Process-wide settings handle. Loaded once at start-up and reloaded after each write,
 * so readers always see the last committed values without touching the database.
 */
export class SettingsStore {
  private snapshot: Settings = toSettings(new Map());

  constructor(private readonly repo: SettingsRepository) {}

  static async load(repo: SettingsRepository): Promise<SettingsStore> {
    const store = new SettingsStore(repo);
    await store.reload();
    return store;
  }

  current(): Settings {
    return this.snapshot;
  }

  async reload(): Promise<Settings> {
    this.snapshot = toSettings(await this.repo.loadAll());
    return this.snapshot;
  }

  async setFooterText(text: string): Promise<Settings> {
    const parsed = FooterTextSchema.safeParse(text);
    if (!parsed.success) {
      throw new ValidationError("Footer text must be 1-200 characters", "/footer <text>");
    }
    return this.write({ footer_text: parsed.data });
  }

  async setFooterEnabled(enabled: boolean): Promise<Settings> {
    return this.write({ footer_enabled: enabled ? "1" : "0" });
  }

  async setAutoquizEnabled(enabled: boolean): Promise<Settings> {
    return this.write({ autoquiz_enabled: enabled ? "1" : "0" });
  }

  async setAutoquizInterval(minutes: unknown): Promise<Settings> {
    const parsed = AutoquizIntervalSchema.safeParse(minutes);
    if (!parsed.success) {
      throw new ValidationError("Interval must be a whole number of minutes (1-1440)", "/autoquiz interval <minutes>");
    }
    return this.write({ autoquiz_interval: String(parsed.data) });
  }

  private async write(values: Partial<Record<SettingKey, string>>): Promise<Settings> {
    const entries: Record<string, string> = {};
    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) entries[key] = value;
    }
    await this.repo.put(entries);
    return this.reload();
  }
}
