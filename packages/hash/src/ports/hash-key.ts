/**
 * Identifies one hash in the store, e.g. `users:42`.
 */
export type HashKey = string

/**
 * Identifies one field within a hash. Case-sensitive; validated by the store only.
 */
export type FieldName = string
