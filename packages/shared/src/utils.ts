/**
 * Shared helpers for spring-position naming.
 * Usage: import { springPositionKey } from "@spring-shop/shared";
 */

/**
 * Lookup key for a spring-position display name: lower-cased with every
 * space removed ("Secondary Outer" -> "secondaryouter"). Checklist answers,
 * report columns and resolver output all key positions through this.
 */
export function springPositionKey(positionName: string): string {
  return positionName.toLowerCase().replace(/ /g, "");
}

export function formatQuantityPerBogie(quantity: number): string {
  return `${quantity} per bogie`;
}

/** First ten characters of an ISO timestamp, i.e. the calendar date. */
export function isoDatePart(value: string | null | undefined): string {
  return (value ?? "").slice(0, 10);
}
