/**
 * Health API request types
 */

/**
 * Date range parameters every data endpoint takes
 */
export type HealthApiDateParams = {
  tdate: string;
  dEndDate: string;
};
