import { loadEnvConfig } from "@next/env";
import { createQueryRouter } from "@/lib/index";

loadEnvConfig(process.cwd());

function parseBoolean(value: string | undefined): boolean | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return undefined;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const stream = args.includes("--stream");
  const query = args.filter((arg) => arg !== "--stream").join(" ").trim();
  if (!query) {
    throw new Error('Usage: npm run ask -- [--stream] "<question>"');
  }

  const router = createQueryRouter();
  const options = {
    useRetrieval: parseBoolean(process.env.ASK_USE_RETRIEVAL),
    useLegal: parseBoolean(process.env.ASK_USE_LEGAL),
  };

  if (stream) {
    for await (const chunk of router.streamAnswer(query, options)) {
      process.stdout.write(chunk);
    }
    process.stdout.write("\n");
    return;
  }

  const result = await router.answer(query, options);
  console.log(result.answer);
  console.log(
    JSON.stringify(
      {
        sources: result.sources,
        model: result.model,
        usage: result.usage,
        error: result.error,
        metadata: result.metadata,
      },
      null,
      2,
    ),
  );
}

void main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
