/** A duration or an epoch timestamp, in milliseconds. */
export type Milliseconds = number
