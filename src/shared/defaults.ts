/** How long a bundle download waits for all of its assets by default. */
export const DEFAULT_BUNDLE_TIMEOUT_MS = 10_000;
