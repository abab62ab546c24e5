import { env } from '../config.js';
import { logger } from '../utils/logger.js';

async function send(text: string): Promise<void> {
  if (!env.TELEGRAM_BOT_TOKEN || !env.TELEGRAM_CHAT_ID) {
    logger.debug('Telegram not configured — alert dropped', { text });
    return;
  }
  try {
    const res = await fetch(`https://api.telegram.org/bot${env.TELEGRAM_BOT_TOKEN}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: env.TELEGRAM_CHAT_ID, text, parse_mode: 'HTML' }),
      signal: AbortSignal.timeout(5_000),
    });
    if (!res.ok) logger.warn('Telegram send failed', { status: res.status });
  } catch (err) {
    logger.warn('Telegram unreachable', { error: String(err) });
  }
}

export interface JobReport {
  jobId: string;
  status: string;
  segments: number;
  degradedSegments: number;
  failedSegments: number;
  cacheHits: number;
  apiCalls: number;
  elapsedMs: number;
  outputPath?: string;
}

export const telegram = {
  alert: (msg: string) => send(`⚠️ ${msg}`),
  info:  (msg: string) => send(`ℹ️ ${msg}`),
  error: (msg: string) => send(`🚨 ${msg}`),

  jobReport: (r: JobReport) => send(
    `🎬 <b>Render job ${r.status}</b>\n` +
    `ID: <code>${r.jobId}</code>\n` +
    `Segments: ${r.segments} (${r.degradedSegments} degraded, ${r.failedSegments} failed)\n` +
    `Cache hits: ${r.cacheHits} · API calls: ${r.apiCalls}\n` +
    `Elapsed: ${(r.elapsedMs / 1000).toFixed(1)}s\n` +
    (r.outputPath ? `Output: ${r.outputPath}` : ''),
  ),
};
