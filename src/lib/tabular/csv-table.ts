import { promises as fs } from 'fs'
import { parse } from 'csv-parse'
import { stringify } from 'csv-stringify'
import { z } from 'zod'
import { AddressRow } from '@lib/address/address-normalizer'

export type TableRow = Record<string, string>

export interface Table {
  headers: string[]
  rows: TableRow[]
}

export const OUTPUT_COLUMNS = ['lat', 'lng', 'provider', 'display_name', 'confidence_score'] as const

export type OutputColumn = (typeof OUTPUT_COLUMNS)[number]

/**
 * Accepted headers per address field, canonical name first.
 */
export const COLUMN_ALIASES: Record<keyof AddressRow, string[]> = {
  name: ['name', 'Наименование', 'Име'],
  street_address: ['street_address', 'Адрес', 'address'],
  settlement: ['settlement', 'Населено място', 'Град', 'city'],
  region: ['region', 'Област', 'oblast'],
}

const recordsSchema = z.array(z.record(z.string(), z.string()))

export async function readTable(filePath: string): Promise<Table> {
  const content = await fs.readFile(filePath, 'utf-8')

  const records = await new Promise<unknown>((resolve, reject) => {
    parse(
      content,
      {
        bom: true,
        columns: true,
        skip_empty_lines: true,
        relax_column_count: true,
        trim: true,
      },
      (err, parsed) => {
        if (err) reject(err)
        else resolve(parsed)
      },
    )
  })

  const rows = recordsSchema.parse(records)
  const headers = rows.length > 0 ? Object.keys(rows[0]) : await readHeaderLine(content)

  return { headers, rows }
}

async function readHeaderLine(content: string): Promise<string[]> {
  const firstLine = content.replace(/^\uFEFF/, '').split(/\r?\n/, 1)[0] ?? ''
  if (!firstLine.trim()) return []

  return new Promise<string[]>((resolve, reject) => {
    parse(firstLine, { trim: true }, (err, parsed) => {
      if (err) return reject(err)
      const [header] = z.array(z.array(z.string())).parse(parsed)
      resolve(header ?? [])
    })
  })
}

export async function writeTable(filePath: string, table: Table): Promise<void> {
  const headers = [...table.headers]
  for (const column of OUTPUT_COLUMNS) {
    if (!headers.includes(column)) headers.push(column)
  }

  const output = await new Promise<string>((resolve, reject) => {
    stringify(table.rows, { header: true, columns: headers, bom: true }, (err, csv) => {
      if (err) reject(err)
      else resolve(csv)
    })
  })

  const tempPath = `${filePath}.tmp`
  await fs.writeFile(tempPath, output, 'utf-8')
  await fs.rename(tempPath, filePath)
}

export function toAddressRow(row: TableRow): AddressRow {
  const pick = (field: keyof AddressRow): string => {
    for (const alias of COLUMN_ALIASES[field]) {
      const value = row[alias]
      if (value !== undefined && value.trim() !== '') return value
    }
    return ''
  }

  return {
    name: pick('name'),
    street_address: pick('street_address'),
    settlement: pick('settlement'),
    region: pick('region'),
  }
}
