#!/usr/bin/env npx tsx
/**
 * Company Enrichment Script
 *
 * Reads a company CSV, finds websites, emails, contact forms, Facebook pages
 * and logos, and writes the enriched CSV.
 *
 * Usage:
 *   npm run enrich -- companies.csv
 *   npm run enrich -- companies.csv --out=enriched.csv --limit=20
 *   npm run enrich -- companies.csv --delay=0
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import {
  enrichCompanies,
  generateResultsCsv,
  getErrorMessage,
  initMonitoring,
  parseCompaniesCsv,
  validateConfig,
} from '../lib';
import { parseFlag } from '../lib/cli-args';

// Load environment variables
dotenv.config({ path: '.env.local' });
dotenv.config({ path: '.env' });

function defaultOutputPath(inputPath: string): string {
  const { dir, name } = path.parse(inputPath);
  return path.join(dir, `${name}-enriched.csv`);
}

async function main() {
  const args = process.argv.slice(2);
  const inputPath = args.find(a => !a.startsWith('--'));

  if (!inputPath) {
    console.error('❌ Input CSV path is required');
    console.error('   Usage: npm run enrich -- <input.csv> [--out=<file>] [--delay=<ms>] [--limit=<n>]');
    process.exit(1);
  }

  const outputPath = parseFlag(args, 'out') || defaultOutputPath(inputPath);
  const delayArg = parseFlag(args, 'delay');
  const delayMs = delayArg !== undefined ? parseInt(delayArg, 10) : undefined;
  const limitArg = parseFlag(args, 'limit');
  const limit = limitArg !== undefined ? parseInt(limitArg, 10) : undefined;

  initMonitoring();
  for (const warning of validateConfig()) {
    console.warn(`⚠️  ${warning}`);
  }

  const { records, skipped } = parseCompaniesCsv(fs.readFileSync(inputPath, 'utf-8'));
  const companies = limit !== undefined && !isNaN(limit) ? records.slice(0, limit) : records;

  console.log('🔍 Company Enrichment');
  console.log('========================');
  console.log(`   Input: ${inputPath}`);
  console.log(`   Companies: ${companies.length}${skipped ? ` (${skipped} invalid rows skipped)` : ''}`);
  console.log(`   Output: ${outputPath}`);
  console.log('');

  if (companies.length === 0) {
    console.log('✅ No companies to enrich!');
    return;
  }

  const { results, summary } = await enrichCompanies(companies, {
    delayMs: delayMs !== undefined && !isNaN(delayMs) ? delayMs : undefined,
    onProgress: ({ completed, total, companyName }) => {
      console.log(`   [${completed}/${total}] ${companyName}`);
    },
  });

  fs.writeFileSync(outputPath, generateResultsCsv(results), 'utf-8');

  console.log('');
  console.log('========================');
  console.log('✅ Complete!');
  console.log(`   Researched: ${summary.total} companies`);
  console.log(`   Websites found: ${summary.websitesFound}`);
  console.log(`   Email addresses: ${summary.emailsFound}`);
  console.log(`   Facebook pages: ${summary.facebookPagesFound}`);
}

main().catch(error => {
  console.error('❌ Error:', getErrorMessage(error));
  process.exit(1);
});
