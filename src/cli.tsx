#!/usr/bin/env node
import { render } from "ink";
import { App } from "./app.js";
import { parseCliArgs, USAGE } from "./cli-args.js";
import { APP_NAME, APP_VERSION } from "./config.js";
import { FeedFetcher } from "./services/feed-fetcher.js";
import { createAppStore } from "./stores/app-store.js";
import { logger } from "./utils/logger.js";

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));

  switch (args.kind) {
    case "help":
      console.log(USAGE);
      return 0;
    case "version":
      console.log(`${APP_NAME} ${APP_VERSION}`);
      return 0;
    case "error":
      console.error(`${APP_NAME}: ${args.message}\n\n${USAGE}`);
      return 2;
    case "run":
      break;
  }

  const store = createAppStore(new FeedFetcher(), args.url);
  logger.info({ url: args.url ?? null }, `${APP_NAME} started`);

  // Ctrl+C arrives as a keypress in raw mode; the shell maps it to quit.
  const instance = render(<App store={store} />, { exitOnCtrlC: false });
  if (args.url) {
    void store.getState().dispatch({ type: "input/submitted", value: args.url });
  }

  await instance.waitUntilExit();
  logger.info(`${APP_NAME} exited`);
  return 0;
}

process.on("SIGINT", () => process.exit(130));

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    logger.fatal({ err }, "Unexpected error");
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  },
);
