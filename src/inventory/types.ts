/**
 * jumpkey — Inventory Types
 */

/** One inventory row. All fields are kept exactly as stored. */
export type HostRecord = {
  readonly name: string
  readonly address: string
  readonly user: string
  readonly credential: string
  readonly description: string
  /** Empty when the row leaves it blank; see effectivePort() */
  readonly port: string
}

export type FieldName = Exclude<keyof HostRecord, 'name'>

/** Read-only map of host name → record, in file order */
export type Inventory = ReadonlyMap<string, HostRecord>

export type LoadResult =
  | { kind: 'loaded'; inventory: Inventory }
  | { kind: 'created'; path: string }
