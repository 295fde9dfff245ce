/**
 * Live execution logger for wayfind.
 *
 * All output goes to stderr so stdout stays clean for operation results.
 * Emoji prefixes give instant visual context in the terminal.
 * WAYFIND_QUIET=1 keeps only errors.
 */

// ── Core write ──────────────────────────────────────────────

function quiet(): boolean {
  const value = process.env['WAYFIND_QUIET'];
  return value === '1' || value === 'true';
}

function write(message: string): void {
  if (quiet()) return;
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
  process.stderr.write(`💥 ${message}\n`);
}

export function extracted(elementCount: number, skippedFrames: number, url: string): void {
  const skipped = skippedFrames > 0 ? `, ${String(skippedFrames)} frame(s) skipped` : '';
  write(`🔍 Extracted ${String(elementCount)} interactive elements on ${url}${skipped}`);
}

export function cache(event: 'hit' | 'miss' | 'stale', description: string): void {
  const icon = event === 'hit' ? '⚡' : event === 'stale' ? '♻️ ' : '·';
  write(`${icon} Cache ${event}: "${description}"`);
}

export function oracle(message: string): void {
  write(`🧠 ${message}`);
}

export function attempt(name: string, success: boolean): void {
  write(success ? `  ✅ ${name} worked` : `  ⚠️ ${name} didn't change content`);
}

export function action(message: string): void {
  write(`👉 ${message}`);
}
