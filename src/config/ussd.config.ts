import { ConfigService } from "@nestjs/config";

export const USSD_CONFIG = Symbol("USSD_CONFIG");

export interface UssdConfig {
  idleTimeoutSeconds: number;
  maxValidationRetries: number;
  maxResponseLength: number;
  inputDelimiter: string;
  ignoredTokens: string[];
  exitInputs: string[];
  showExpiredNotice: boolean;
  menuTreePath: string;
  listingPageSize: number;
  dependencyTimeoutMs: number;
  lockTtlMs: number;
  lockWaitMs: number;
  sweepIntervalSeconds: number;
}

export const DEFAULT_USSD_CONFIG: UssdConfig = {
  idleTimeoutSeconds: 180,
  maxValidationRetries: 3,
  maxResponseLength: 182,
  inputDelimiter: "*",
  ignoredTokens: ["98"],
  exitInputs: ["00"],
  showExpiredNotice: true,
  menuTreePath: "config/menu-tree.json",
  listingPageSize: 3,
  dependencyTimeoutMs: 2000,
  lockTtlMs: 5000,
  lockWaitMs: 3000,
  sweepIntervalSeconds: 60,
};

const splitList = (value: string | undefined, fallback: string[]): string[] => {
  if (value === undefined) return fallback;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

const toBoolean = (value: unknown, fallback: boolean): boolean => {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") return value.toLowerCase() === "true";
  return fallback;
};

/** Builds the typed dialog settings from the Joi-validated environment */
export const ussdConfigFactory = (configService: ConfigService): UssdConfig => {
  const defaults = DEFAULT_USSD_CONFIG;
  const num = (key: string, fallback: number): number =>
    Number(configService.get<number | string>(key, fallback));

  return {
    idleTimeoutSeconds: num("USSD_SESSION_IDLE_TIMEOUT_SECONDS", defaults.idleTimeoutSeconds),
    maxValidationRetries: num("USSD_MAX_VALIDATION_RETRIES", defaults.maxValidationRetries),
    maxResponseLength: num("USSD_MAX_RESPONSE_LENGTH", defaults.maxResponseLength),
    inputDelimiter: configService.get<string>("USSD_INPUT_DELIMITER", defaults.inputDelimiter),
    ignoredTokens: splitList(configService.get<string>("USSD_IGNORED_TOKENS"), defaults.ignoredTokens),
    exitInputs: splitList(configService.get<string>("USSD_EXIT_INPUTS"), defaults.exitInputs),
    showExpiredNotice: toBoolean(
      configService.get<boolean | string>("USSD_SHOW_EXPIRED_NOTICE"),
      defaults.showExpiredNotice,
    ),
    menuTreePath: configService.get<string>("USSD_MENU_TREE_PATH", defaults.menuTreePath),
    listingPageSize: num("USSD_LISTING_PAGE_SIZE", defaults.listingPageSize),
    dependencyTimeoutMs: num("DEPENDENCY_TIMEOUT_MS", defaults.dependencyTimeoutMs),
    lockTtlMs: num("SESSION_LOCK_TTL_MS", defaults.lockTtlMs),
    lockWaitMs: num("SESSION_LOCK_WAIT_MS", defaults.lockWaitMs),
    sweepIntervalSeconds: num("SESSION_SWEEP_INTERVAL_SECONDS", defaults.sweepIntervalSeconds),
  };
};
