/**
 * Token secret: fixed at build time.
 *
 * Not a runtime setting. Changing it invalidates every match key ever issued,
 * since the ledger stores no key-version tag.
 */

export const TOKEN_SECRET = 'MATCH_KEY_STATIC_SALT_V1';
