/** Durations and epoch timestamps, in milliseconds. */
export type Milliseconds = number
