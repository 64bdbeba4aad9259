import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import type { ScoredHit } from '../retrieval/types';
import type { QuotaUsage } from '../quota/quota-manager';
import type { EngineConfig } from '../config/config';

const SCORE_WIDTH = 8;

function scoreLabel(score: number | null): string {
  if (score === null) return chalk.dim('unranked');

  const text = score.toFixed(4);
  if (score >= 0.7) return chalk.greenBright(text);
  if (score >= 0.5) return chalk.green(text);
  if (score > 0) return chalk.yellow(text);
  return chalk.red(text);
}

export function printQueryHeader(query: string) {
  console.log(chalk.bold.underline(query));
}

export function printEvidenceRow(rank: number, hit: ScoredHit) {
  const colored = scoreLabel(hit.similarityScore);
  const pad = Math.max(0, SCORE_WIDTH - stripAnsi(colored).length);
  const prefix = `  ${String(rank).padStart(2, ' ')}. ${colored}${' '.repeat(pad)}  `;
  const contPrefix = ' '.repeat(stripAnsi(prefix).length);

  console.log(`${prefix}${chalk.cyan(hit.title || hit.link)}`);
  console.log(`${contPrefix}${chalk.dim(hit.link)}`);
  if (hit.snippet) {
    console.log(`${contPrefix}${hit.snippet}`);
  }
  // Blank line after each row block
  console.log('');
}

export function printRetrievalSummary(queries: number, evidence: number) {
  const okMark = evidence > 0 ? chalk.green('✓') : chalk.yellow('!');
  const evTxt = evidence === 1 ? '1 evidence item' : `${evidence} evidence items`;
  const qTxt = queries === 1 ? '1 query' : `${queries} queries`;
  console.log(`${okMark} ${evTxt} for ${qTxt}.`);
}

export function printQuotaUsage(usage: QuotaUsage) {
  const limitTxt = usage.remaining === null ? 'unlimited' : String(usage.limit);
  console.log(`${chalk.bold('Search quota')} (${usage.date} UTC)`);
  console.log(`  Used:      ${usage.used}`);
  console.log(`  Limit:     ${limitTxt}`);
  if (usage.remaining !== null) {
    const remaining = usage.remaining > 0 ? chalk.green(String(usage.remaining)) : chalk.red('0');
    console.log(`  Remaining: ${remaining}`);
  }
}

function status(value: string | undefined): string {
  return value ? chalk.green('✓ Set') : chalk.red('✗ Missing');
}

export function printConfigStatus(config: EngineConfig) {
  console.log(chalk.bold('=== Evidence Engine Configuration Status ==='));
  console.log(`Search API Key:          ${status(config.search.apiKey)}`);
  console.log(`Custom Search Engine ID: ${status(config.search.cx)}`);
  console.log(`Gemini API Key:          ${status(config.embedding.apiKey)}`);
  console.log(`Search Endpoint:         ${config.search.endpoint}`);
  console.log(`Embedding Model:         ${config.embedding.apiKey ? config.embedding.model : 'local term frequency'}`);
  console.log(`Daily Query Limit:       ${config.quota.dailyLimit > 0 ? config.quota.dailyLimit : 'unlimited'}`);
  console.log(`Quota Store:             ${config.quota.storePath}`);
  console.log(`Search Cache:            ${config.cache.path}`);
  console.log(`Default Search Results:  ${config.retrieval.searchResults}`);
  console.log(`Default Top-K:           ${config.retrieval.topK}`);
  console.log(`Log Level:               ${config.logLevel}`);
}
