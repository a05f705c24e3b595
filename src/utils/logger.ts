/**
 * Live execution logger for acceptkit.
 *
 * All output goes to stderr so stdout stays clean for JSON contract output.
 * Emoji prefixes give instant visual context in the terminal.
 */

import type { Outcome } from '../schema/outcome.js';

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function seed(value: number, generated: boolean): void {
  const origin = generated ? 'generated' : 'supplied';
  write(`🎲 Seed ${String(value)} (${origin}), replay with --seed=${String(value)}`);
}

export function dispatch(index: number, total: number, unitId: string): void {
  write(`📋 [${String(index + 1)}/${String(total)}] ${unitId}`);
}

export function session(message: string): void {
  write(`🌐 ${message}`);
}

export function unitResult(outcome: Outcome): void {
  const icon = outcome.status === 'PASS' ? '✅' : outcome.status === 'FAIL' ? '❌' : '💥';
  const reason = outcome.failure ? ` - ${outcome.failure.kind}: ${outcome.failure.message}` : '';
  write(`${icon} ${outcome.unitId} ${outcome.status} (${String(outcome.durationMs)}ms)${reason}`);
}

export function teardown(sessionId: string, problem: string): void {
  write(`🧹 Teardown of ${sessionId}: ${problem}`);
}
