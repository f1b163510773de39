/**
 * Runtime module: calendar-driven heartbeat around the goal agent.
 */

export { DailyScheduler, calendarDayIndex, DAY_MS } from './daily-scheduler';
export type { DailySchedulerOptions, ScheduledAgent } from './types';
