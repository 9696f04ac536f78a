/**
 * Stowage Wire Protocol — Version
 *
 * Sent in every request and echoed in every response. Bump PROTOCOL_VERSION when:
 * - A request or status code is added or removed
 * - A frame field changes width, order or meaning
 * - A payload layout changes (e.g. listing entries)
 *
 * Do NOT bump for:
 * - Client-side behavior (retry, reporting, file handling)
 */

export const PROTOCOL_VERSION = 1;
