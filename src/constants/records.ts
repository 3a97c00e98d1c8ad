/**
 * Health record constants: sentinel, value cleaning and derived columns
 */

/**
 * Stored in any column whose source value could not be obtained
 */
export const NOT_AVAILABLE = "Not Available";

/**
 * Raw values treated as absent (compared lowercase, trimmed)
 */
export const ABSENT_VALUE_TOKENS: readonly string[] = [
  "null",
  "none",
  "nan",
  "not found",
  "notfound",
  "n/a",
  "na",
  "-",
];

export const RECORD_STATE_NAME = "Bihar";

export const RECORD_FOCUS_AREA = "State Health System Performance";

export const RECORD_SOURCE = "Bhavya";

/**
 * Columns computed from the date and run, never from an endpoint
 * (order matches the table layout)
 */
export const DERIVED_COLUMNS = [
  "data_date",
  "state_name",
  "focus_area",
  "year",
  "month",
  "start_date",
  "end_date",
  "source",
  "fetched_at",
] as const;

export const MONTH_NAMES: readonly string[] = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];
