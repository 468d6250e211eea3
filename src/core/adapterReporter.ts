/**
 * Startup diagnostics: which adapters are reachable and which one is picked by default.
 *
 * WebGPU exposes no adapter enumeration, so the reporter probes each power preference and the
 * fallback adapter, then drops probes that resolved to the same adapter.
 */

import type { Logger } from '../utils/logger';

const PROBES: readonly GPURequestAdapterOptions[] = [
  { powerPreference: 'low-power' },
  { powerPreference: 'high-performance' },
  { forceFallbackAdapter: true },
];

const orUnknown = (value: string): string => (value.trim() === '' ? 'unknown' : value);

/**
 * One-line adapter description: `vendor architecture (description)`.
 */
export function formatAdapterInfo(info: GPUAdapterInfo): string {
  return `${orUnknown(info.vendor)} ${orUnknown(info.architecture)} (${orUnknown(
    info.description || info.device
  )})`;
}

/**
 * Probes the reachable adapters and returns their descriptions, without duplicates, in probe order.
 */
export async function enumerateAdapters(gpu: GPU): Promise<string[]> {
  const seen = new Set<string>();

  for (const probe of PROBES) {
    const adapter = await gpu.requestAdapter(probe);
    if (!adapter) continue;
    seen.add(formatAdapterInfo(adapter.info));
  }

  return [...seen];
}

/**
 * Logs every reachable adapter, then the default one.
 *
 * @throws {Error} If no default adapter can be requested
 */
export async function reportAdapters(gpu: GPU, logger: Logger): Promise<void> {
  const available = await enumerateAdapters(gpu);

  logger.info('Available adapters:');
  for (const line of available) {
    logger.info(`    ${line}`);
  }

  const adapter = await gpu.requestAdapter();
  if (!adapter) {
    throw new Error('could not request default adapter');
  }

  logger.info(`Default adapter: ${formatAdapterInfo(adapter.info)}`);
}
