import { z } from "zod";

const optionalTrimmed = z
  .string()
  .trim()
  .optional()
  .transform((val) => (val ? val : undefined));

const optionalInt = (name: string, min: number, max: number) =>
  z
    .string()
    .trim()
    .optional()
    .refine(
      (val) => !val || /^\d+$/.test(val),
      `${name} must contain only numbers.`
    )
    .transform((val) => (val ? Number(val) : undefined))
    .refine(
      (val) => val === undefined || (val >= min && val <= max),
      `${name} must be between ${min} and ${max}.`
    );

export const settingsSchema = z
  .object({
    ESPN_SWID: optionalTrimmed.refine(
      (val) => !val || /^\{[0-9A-Fa-f-]+\}$/.test(val),
      "ESPN SWID must look like {XXXXXXXX-XXXX-...} including braces."
    ),
    ESPN_S2: optionalTrimmed,
    ESPN_LEAGUE_IDS: z
      .string()
      .trim()
      .optional()
      .refine(
        (val) => !val || /^\d+(\s*,\s*\d+)*$/.test(val),
        "ESPN league ids must be a comma-separated list of numbers."
      )
      .transform((val) => (val ? val.split(",").map((id) => id.trim()) : [])),
    SLEEPER_USER: optionalTrimmed,
    SEASON_YEAR: z
      .string()
      .trim()
      .optional()
      .refine(
        (val) => !val || /^\d{4}$/.test(val),
        "Season year must be a four-digit year."
      ),
    FANTASY_WEEK: optionalInt("Fantasy week", 1, 22),
    CURRENT_NFL_WEEK: optionalInt("Current NFL week", 1, 22),
    REFRESH_INTERVAL_MS: optionalInt("Refresh interval", 1000, 3_600_000).transform(
      (val) => val ?? 15_000
    ),
    JOIN_TIMEOUT_MS: optionalInt("Join timeout", 1000, 600_000),
  })
  .refine(
    (val) => val.ESPN_LEAGUE_IDS.length === 0 || Boolean(val.ESPN_SWID),
    {
      message: "ESPN leagues need ESPN_SWID to find your team.",
      path: ["ESPN_SWID"],
    }
  );

export type SettingsSchema = z.infer<typeof settingsSchema>;
