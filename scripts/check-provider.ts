/**
 * One tiny generation call to confirm the configured key and model work.
 *
 * Usage:
 *   GENERATION_PROVIDER=openai OPENAI_API_KEY=... OPENAI_MODEL_NAME=gpt-4o-mini npm run check:provider
 */

import { probeProvider } from '../src/clients/llm.js';
import { loadConfig, requireLLMConfig } from '../src/config.js';

async function main() {
  const llm = requireLLMConfig(loadConfig());
  console.log(`[check] provider=${llm.provider} model=${llm.model}`);
  const reply = await probeProvider(llm);
  console.log(`[ok] reply=${JSON.stringify(reply)}`);
}

main().catch((error) => {
  console.error('[check] FAILED:', error instanceof Error ? error.message : error);
  process.exit(1);
});
