export const INDEPENDENT = "Independent";
export const UNKNOWN = "Unknown";
export const MANUAL_REVIEW_GROUP = "Part of Restaurant Group (verify manually)";
export const ERROR_PREFIX = "ERROR:";

export const VERIFIED = {
  GROUP_IDENTIFIED: "Yes - Group Identified",
  GROUP_FOUND: "Yes - Group Found",
  CONFIRMED_INDEPENDENT: "Yes - Confirmed Independent",
  SEARCH_UNAVAILABLE: "No - Serper Not Available"
} as const;

export type VerifiedTag = (typeof VERIFIED)[keyof typeof VERIFIED] | "";

export type GroupAnswer = {
  group: string;
  locations: string;
};

export type RestaurantIdentity = {
  name: string;
  market?: string;
  domain?: string;
};

export type Annotation = GroupAnswer & { verified: VerifiedTag };

export function errorAnswer(detail: string): GroupAnswer {
  return { group: `${ERROR_PREFIX} ${detail}`, locations: "" };
}

export function isErrorGroup(group: string): boolean {
  return group.startsWith(ERROR_PREFIX);
}

export function isResolved(a: { group: string; verified: string }, requireVerified: boolean): boolean {
  if (!a.group) return false;
  return requireVerified ? a.verified.startsWith("Yes") : true;
}
