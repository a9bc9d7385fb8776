import { readFile } from "node:fs/promises";
import path from "node:path";
import { loadEnvConfig } from "@next/env";
import { SharedCache } from "@/lib/cache/shared-cache";
import { Resilience } from "@/lib/resilience/resilience";
import { createEmbedder } from "@/lib/retrieval/embeddings";
import { RetrievalService } from "@/lib/retrieval/retrieval-service";
import { QdrantDocumentStore } from "@/lib/retrieval/vector-store";
import { loadRuntimeConfig } from "@/lib/runtime-config";

loadEnvConfig(process.cwd());

async function main(): Promise<void> {
  const [filePath, nameArg] = process.argv.slice(2);
  if (!filePath) {
    throw new Error("Usage: npm run add-document -- <file.txt> [document name]");
  }

  const config = loadRuntimeConfig();
  const cache = new SharedCache();
  const retrieval = new RetrievalService({
    backend: new QdrantDocumentStore({ embedder: createEmbedder() }),
    cache,
    resilience: new Resilience({ presets: config.presets }),
    ttls: config.cacheTtls,
  });

  const name = nameArg?.trim() || path.basename(filePath);
  const text = await readFile(filePath, "utf8");
  const chunks = await retrieval.addDocument(name, text);
  console.log(JSON.stringify({ status: "indexed", name, chunks }, null, 2));
}

void main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
