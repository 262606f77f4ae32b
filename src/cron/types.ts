export interface CronSchedule {
  /** Five fields, or six with a leading seconds field. */
  expr: string;
  /** IANA zone name; host local time when absent. */
  tz?: string;
}
