import { loadEnvConfig } from "@next/env";
import { createQueryRouter } from "@/lib/index";

loadEnvConfig(process.cwd());

async function main(): Promise<void> {
  const router = createQueryRouter();
  console.log(JSON.stringify({ status: "ok", ...router.health() }, null, 2));
}

void main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
