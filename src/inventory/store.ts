/**
 * jumpkey — Inventory Store
 *
 * Reads the comma-separated server list:
 *   name,address,user,credential,description,port
 *
 * A missing file is the first-run case: a header-only template is
 * written in its place and the caller is told nothing was loaded.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import type { FieldName, HostRecord, Inventory, LoadResult } from './types.js'

export const INVENTORY_HEADER = 'Name,IP,User,Password,Description,Port'
export const DEFAULT_PORT = '22'

// ── Parsing ─────────────────────────────────────────────────────────────────

/** Turn one row into a record; absent columns are empty, extra columns ignored */
export function parseRow(line: string): HostRecord {
  const [name = '', address = '', user = '', credential = '', description = '', port = ''] =
    line.replace(/\r$/, '').split(',')
  return { name, address, user, credential, description, port: port.trim() }
}

/** Parse the whole file. Duplicate names: last row wins. */
export function parseInventory(text: string): Inventory {
  const hosts = new Map<string, HostRecord>()

  for (const line of text.split('\n')) {
    const record = parseRow(line)
    if (record.name === 'Name') continue // header
    if (!record.name) continue
    hosts.set(record.name, record)
  }

  return hosts
}

// ── Loader ──────────────────────────────────────────────────────────────────

export function loadInventory(path: string): LoadResult {
  if (!existsSync(path)) {
    mkdirSync(dirname(path), { recursive: true })
    writeFileSync(path, `${INVENTORY_HEADER}\n`, 'utf-8')
    return { kind: 'created', path }
  }

  return { kind: 'loaded', inventory: parseInventory(readFileSync(path, 'utf-8')) }
}

// ── Field access ────────────────────────────────────────────────────────────

export function field(record: HostRecord, name: FieldName): string {
  return record[name]
}

/** Port to connect on: the stored one, or 22 when blank */
export function effectivePort(record: HostRecord): string {
  return record.port || DEFAULT_PORT
}
