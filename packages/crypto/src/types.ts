/** Hex-encoded SHA-256 hash (64 lowercase characters) */
export type HashHex = string;

/** Number of leading zero hex digits required of a mined digest */
export type Difficulty = number;
