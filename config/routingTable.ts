/**
 * Country routing table
 * Maps an ISO-2 country code to the assigned agent and the distributor email.
 * Loaded once at startup from config/country_routing.csv; read-only afterwards.
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';

export interface RoutingEntry {
  countryCode: string;
  agentId: string | null;
  distributorEmail: string | null;
}

export interface RoutingLookup {
  agentId: string | null;
  distributorEmail: string | null;
}

let routingTable = new Map<string, RoutingEntry>();

function normalizeCountryCode(countryCode: string | null | undefined): string {
  return (countryCode || '').trim().toUpperCase();
}

function cell(row: Record<string, unknown>, column: string): string {
  const value = row[column];
  return typeof value === 'string' ? value.trim() : '';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse routing CSV text (header: country_code,agent_id,distributor_email)
 * Rows without a country code are skipped; blank cells become null
 */
export function parseRoutingCsv(csvText: string): RoutingEntry[] {
  const rows: unknown = parse(csvText, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });

  if (!Array.isArray(rows)) {
    return [];
  }

  const entries: RoutingEntry[] = [];
  for (const row of rows) {
    if (!isRecord(row)) continue;

    const countryCode = normalizeCountryCode(cell(row, 'country_code'));
    if (!countryCode) continue;

    entries.push({
      countryCode,
      agentId: cell(row, 'agent_id') || null,
      distributorEmail: cell(row, 'distributor_email') || null,
    });
  }
  return entries;
}

/**
 * Replace the in-memory table with the given entries
 * Later duplicates of a country code win
 */
export function replaceRoutingTable(entries: RoutingEntry[]): void {
  const next = new Map<string, RoutingEntry>();
  for (const entry of entries) {
    const countryCode = normalizeCountryCode(entry.countryCode);
    if (countryCode) {
      next.set(countryCode, { ...entry, countryCode });
    }
  }
  routingTable = next;
}

/**
 * Load the routing table from a CSV file
 * Never throws: a missing or malformed file leaves an empty table,
 * which means no country gets an agent or distributor from the table.
 * @returns Number of countries loaded
 */
export function loadRoutingTable(filePath: string): number {
  try {
    const csvText = fs.readFileSync(filePath, 'utf-8');
    replaceRoutingTable(parseRoutingCsv(csvText));
    console.log(`🗺️  Loaded routing data for ${routingTable.size} countries from ${filePath}`);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    replaceRoutingTable([]);
    console.warn(`⚠️  Could not load routing table (${filePath}): ${message}`);
    console.warn('⚠️  Continuing without country routing - conversations will use default agents');
  }
  return routingTable.size;
}

/**
 * Look up routing for a country code (case-insensitive)
 * Unknown or empty codes return nulls
 */
export function lookupRouting(countryCode: string | null | undefined): RoutingLookup {
  const normalized = normalizeCountryCode(countryCode);
  if (!normalized) {
    return { agentId: null, distributorEmail: null };
  }

  const entry = routingTable.get(normalized);
  if (!entry) {
    console.log(`No routing found for country: ${normalized}`);
    return { agentId: null, distributorEmail: null };
  }

  console.log(
    `Routing for ${normalized}: agent_id=${entry.agentId ?? 'none'}, distributor=${entry.distributorEmail ?? 'none'}`
  );
  return { agentId: entry.agentId, distributorEmail: entry.distributorEmail };
}

export function getRoutingTableSize(): number {
  return routingTable.size;
}
