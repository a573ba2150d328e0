import { closeAllConnections } from "./resp/connection";

const SIGNAL_EXIT_CODES: Record<"SIGINT" | "SIGTERM", number> = {
  SIGINT: 130,
  SIGTERM: 143,
};

export function setupShutdownHandler(): void {
  const shutdown = (signal: "SIGINT" | "SIGTERM") => {
    console.log(`\n[Startup] ${signal} received, shutting down...`);

    const closed = closeAllConnections();
    if (closed > 0) {
      console.log(`[Startup] Closed ${closed} open connection(s)`);
    }

    process.exit(SIGNAL_EXIT_CODES[signal]);
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}
