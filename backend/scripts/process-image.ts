import path from 'path';
import { mkdirSync } from 'fs';

import { ChatCompletionsClient } from '../ai/extractor/llmClient';
import { loadConfig } from '../services/config';
import { setLogLevel } from '../services/log';
import { ParcelPipeline } from '../services/pipeline-orchestrator';
import { createOcrEngine } from '../services/textract';

// Usage: npm run process -- <image> [minConfidence]
(async () => {
  try {
    const [imageArg, minArg] = process.argv.slice(2);
    if (!imageArg) {
      throw new Error('Usage: npm run process -- <image> [minConfidence]');
    }
    const minConfidence = minArg === undefined ? undefined : Number(minArg);
    if (minConfidence !== undefined && !(minConfidence >= 0 && minConfidence <= 1)) {
      throw new Error(`minConfidence must be between 0 and 1, got "${minArg}"`);
    }

    const config = loadConfig();
    setLogLevel(config.logLevel);
    mkdirSync(config.uploadDir, { recursive: true });

    const pipeline = new ParcelPipeline({
      ocr: createOcrEngine(config.awsRegion),
      llm: new ChatCompletionsClient(config.llm),
      config: config.pipeline,
    });

    const result = await pipeline.run(path.resolve(imageArg), { minConfidence });
    console.log(JSON.stringify(result, null, 2));
    process.exitCode = result.success ? 0 : 1;
  } catch (e) {
    console.error('❌ process-image failed:', e instanceof Error ? e.message : e);
    process.exitCode = 1;
  }
})();
