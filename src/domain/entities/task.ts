export const HIGH_PRIORITY = "High";

/**
 * An actionable item extracted from user input.
 * Category and priority are requested from the model but never enforced,
 * so they stay plain strings once parsed.
 */
export interface Task {
  category: string;
  action: string;
  priority: string;
  deadline: string | null; // YYYY-MM-DD, a time, or a free-text description
}
