export const COMPUTE_API_URL = "https://compute.googleapis.com/compute/v1";

export const CLOUD_PLATFORM_SCOPE = "https://www.googleapis.com/auth/cloud-platform";

export const GLOBAL_SCOPE = "global";

// Severity bands, measured on remaining duration
export const EXPIRY_THRESHOLDS = {
  EXPIRING_SOON_DAYS: 10,
  WARNING_DAYS: 30,
};

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const SCAN_DEFAULTS = {
  CONCURRENCY: 5,
  TIMEOUT_MS: 10000,
  RETRIES: 2,
  BACKOFF_MS: 500,
};

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  INVALID_OPTIONS: 2,
};

export const PEM_CERTIFICATE_PATTERN = /-----BEGIN CERTIFICATE-----[\s\S]*?-----END CERTIFICATE-----/;

export const ABSENT_VALUE = "-";
