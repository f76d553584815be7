/**
 * Run `onClose` exactly once: on normal exit, on `process.exit` and on
 * SIGINT/SIGTERM. Returns a function that closes early and unhooks the handlers.
 */
export function gracefulShutdown(onClose: () => void): () => void {
  let closed = false;

  const close = () => {
    if (closed) return;
    closed = true;
    onClose();
  };

  const handler = (signal: NodeJS.Signals) => {
    console.error(`\n[pgp-mfa] ${signal} received, shutting down...`);
    close();
    process.exit(signal === "SIGINT" ? 130 : 143);
  };

  process.on("exit", close);
  process.once("SIGTERM", handler);
  process.once("SIGINT", handler);

  return () => {
    process.off("exit", close);
    process.off("SIGTERM", handler);
    process.off("SIGINT", handler);
    close();
  };
}
