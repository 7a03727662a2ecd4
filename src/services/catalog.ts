/**
 * Catalog Service
 * Loads rarities, cases and items from JSON and precomputes drop tables
 */

import { readFileSync } from 'fs'
import { z } from 'zod'
import type {
  Catalog,
  CaseDefinition,
  CatalogItem,
  DropTableEntry,
  ItemPayload,
  Rarity,
} from '../types/index.js'
import { UnknownCaseError, InvalidDropTableError } from '../utils/errors.js'
import { logger } from '../utils/logger.js'

const NonEmptyString = z.string().trim().min(1)
const Amount = z.number().finite().nonnegative()

/**
 * Shape of the catalog file. Item weight is optional: without it an item
 * gets its rarity weight split evenly among same-rarity items in the case.
 */
export const CatalogSchema = z.object({
  rarities: z.array(z.object({
    id: NonEmptyString,
    label: NonEmptyString,
    color: NonEmptyString,
    weight: Amount,
  })),
  cases: z.array(z.object({
    id: NonEmptyString,
    name: NonEmptyString,
    category: z.string().optional(),
    price: Amount,
  })),
  items: z.array(z.object({
    id: NonEmptyString,
    name: NonEmptyString,
    rarity: NonEmptyString,
    price: Amount,
    stattrak: z.boolean().default(false),
    cases: z.array(NonEmptyString).default([]),
    weight: Amount.optional(),
  })),
})

export type CatalogSource = z.input<typeof CatalogSchema>

/**
 * Validate untyped JSON into a CatalogSource; reports the first offending field
 */
export function parseCatalogSource(raw: unknown): z.output<typeof CatalogSchema> {
  const validation = CatalogSchema.safeParse(raw)
  if (!validation.success) {
    const [issue] = validation.error.issues
    const where = issue.path.length > 0 ? ` ${issue.path.join('.')}` : ''
    throw new Error(`Catalog${where}: ${issue.message}`)
  }
  return validation.data
}

/**
 * Build the in-memory catalog: lookup maps plus one frozen drop table per case
 */
export function buildCatalog(source: CatalogSource): Catalog {
  const rarities: Rarity[] = source.rarities.map((r, rank) => ({ ...r, rank }))
  const raritiesById = new Map(rarities.map(r => [r.id, r]))

  const cases: CaseDefinition[] = source.cases.map(c => ({
    id: c.id,
    name: c.name,
    category: c.category ?? 'Other',
    price: c.price,
  }))
  const casesById = new Map<string, CaseDefinition>()
  for (const caseDef of cases) {
    if (casesById.has(caseDef.id)) {
      throw new Error(`Catalog: duplicate case id "${caseDef.id}"`)
    }
    casesById.set(caseDef.id, caseDef)
  }

  const items: CatalogItem[] = []
  const itemsById = new Map<string, CatalogItem>()
  const explicitWeights = new Map<string, number>()
  for (const raw of source.items) {
    if (itemsById.has(raw.id)) {
      throw new Error(`Catalog: duplicate item id "${raw.id}"`)
    }
    if (!raritiesById.has(raw.rarity)) {
      throw new Error(`Catalog: item "${raw.id}" has unknown rarity "${raw.rarity}"`)
    }
    const caseIds = raw.cases ?? []
    const unknownCase = caseIds.find(c => !casesById.has(c))
    if (unknownCase) {
      throw new Error(`Catalog: item "${raw.id}" references unknown case "${unknownCase}"`)
    }

    const item: CatalogItem = Object.freeze({
      id: raw.id,
      name: raw.name,
      rarity: raw.rarity,
      price: raw.price,
      stattrak: raw.stattrak ?? false,
      caseIds,
    })
    items.push(item)
    itemsById.set(item.id, item)
    if (raw.weight !== undefined) {
      explicitWeights.set(item.id, raw.weight)
    }
  }

  const dropTables = new Map<string, readonly DropTableEntry[]>()
  for (const caseDef of cases) {
    const members = items.filter(item => item.caseIds.includes(caseDef.id))

    const perRarity = new Map<string, number>()
    for (const item of members) {
      perRarity.set(item.rarity, (perRarity.get(item.rarity) ?? 0) + 1)
    }

    const table = members
      .map((item): DropTableEntry => {
        const explicit = explicitWeights.get(item.id)
        if (explicit !== undefined) {
          return { item, weight: explicit }
        }
        const rarityWeight = raritiesById.get(item.rarity)?.weight ?? 0
        return { item, weight: rarityWeight / (perRarity.get(item.rarity) ?? 1) }
      })
      .filter(entry => entry.weight > 0)

    dropTables.set(caseDef.id, Object.freeze(table.map(entry => Object.freeze(entry))))
  }

  const categories = [...new Set(cases.map(c => c.category))].sort()

  return {
    rarities,
    cases,
    items,
    categories,
    casesById,
    itemsById,
    raritiesById,
    dropTables,
  }
}

/**
 * Load and validate the catalog file
 */
export function loadCatalog(filePath: string): Catalog {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'))
  const catalog = buildCatalog(parseCatalogSource(raw))

  const emptyCases = catalog.cases.filter(c => (catalog.dropTables.get(c.id)?.length ?? 0) === 0)
  if (emptyCases.length > 0) {
    logger.warn({ cases: emptyCases.map(c => c.id) }, 'Cases without droppable items')
  }

  logger.info({
    filePath,
    cases: catalog.cases.length,
    items: catalog.items.length,
  }, 'Catalog loaded')

  return catalog
}

/**
 * Look up a case and its drop table
 */
export function getCaseWithDropTable(
  catalog: Catalog,
  caseId: string
): { caseDef: CaseDefinition; dropTable: readonly DropTableEntry[] } {
  const caseDef = catalog.casesById.get(caseId)
  if (!caseDef) {
    throw new UnknownCaseError(caseId)
  }

  const dropTable = catalog.dropTables.get(caseId) ?? []
  if (dropTable.length === 0) {
    throw new InvalidDropTableError('case has no droppable items', caseId)
  }

  return { caseDef, dropTable }
}

/**
 * Drop table with normalized probabilities, most common rarity first
 */
export function describeDropTable(
  catalog: Catalog,
  caseId: string
): Array<{ item: CatalogItem; probability: number }> {
  const { dropTable } = getCaseWithDropTable(catalog, caseId)
  const total = dropTable.reduce((sum, entry) => sum + entry.weight, 0)

  return dropTable
    .map(entry => ({ item: entry.item, probability: entry.weight / total }))
    .sort((a, b) => {
      const rankA = catalog.raritiesById.get(a.item.rarity)?.rank ?? Number.MAX_SAFE_INTEGER
      const rankB = catalog.raritiesById.get(b.item.rarity)?.rank ?? Number.MAX_SAFE_INTEGER
      return rankA - rankB || a.item.price - b.item.price
    })
}

/**
 * API shape of a catalog item
 */
export function toItemPayload(item: CatalogItem): ItemPayload {
  return {
    id: item.id,
    name: item.name,
    rarity: item.rarity,
    price: item.price,
    stattrak: item.stattrak,
  }
}
