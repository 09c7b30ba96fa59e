import os from 'node:os';
import path from 'node:path';

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/**
 * Billing calendar used to convert between cadences.
 * A month is 730 hours, a year is 8760 hours (365 days).
 */
export const HOURS_PER_MONTH = 730;
export const HOURS_PER_YEAR = 8760;

export const TOKENS_PER_PRICE_UNIT = 1000;

export const DEFAULT_BUCKET_MINUTES = 1;
export const DEFAULT_MIN_PTU = 15;
export const DEFAULT_MAX_PTU = 100;
export const DEFAULT_PTU_STEP = 5;
export const DEFAULT_MODEL = 'gpt-4.1';
export const DEFAULT_SCHEME = 'YearlyReservation';
export const DEFAULT_HORIZON = 'year';
export const DEFAULT_STRATEGY = 'traffic';

/**
 * PTU capacity per unit when the pricing table has no entry for the model.
 * GPT-4 class models are provisioned at 3000 TPM, smaller ones at 1000 TPM.
 */
export const DEFAULT_TPM_PER_UNIT = 1000;
export const GPT4_TPM_PER_UNIT = 3000;

export const CONFIG_FILE_NAME = 'config.json';
export const LOCAL_CONFIG_DIR = '.ptusim';
export const USER_CONFIG_DIR = path.join(os.homedir(), '.config', 'ptusim');
