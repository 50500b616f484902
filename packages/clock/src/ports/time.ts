/** Duration or epoch offset expressed in milliseconds. */
export type Milliseconds = number
