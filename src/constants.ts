/**
 * Scheduling Constants
 *
 * Fixed policy values of the slot scheduler. Exported individually so each
 * can be asserted on in tests.
 */

/** Working-hours envelope, local time: [09:00, 21:00) every calendar day */
export const WORKDAY_START_HOUR = 9
export const WORKDAY_END_HOUR = 21

/** Gap enforced after every placement before the next may start */
export const BUFFER_MINUTES = 30

/** Free slots shorter than this are discarded at generation time */
export const MIN_SLOT_MINUTES = 30

/** Grid spacing that assigned start/end times snap to (:00 and :30) */
export const GRID_MINUTES = 30

export const MIN_ESTIMATED_HOURS = 0.5
export const MAX_ESTIMATED_HOURS = 6
export const DEFAULT_ESTIMATED_HOURS = 2

/** Forward calendar days considered when generating free slots */
export const DEFAULT_HORIZON_DAYS = 21

/** Forward window of existing calendar events loaded as busy time */
export const BUSY_LOOKAHEAD_DAYS = 30

/** Minimum spread window used for deadline-based target times */
export const MIN_DEADLINE_WINDOW_DAYS = 1

/** Due dates without a time are due at 23:59 local */
export const DUE_HOUR = 23
export const DUE_MINUTE = 59

export const MAX_EVENT_TITLE_LENGTH = 255
export const DEFAULT_TASK_TITLE = 'Assignment Plan'
export const DEFAULT_ITEM_TITLE = 'Subtask'
