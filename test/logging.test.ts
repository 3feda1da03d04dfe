import { expect, test } from "vitest";
import Transport from "winston-transport";
import { createLogger, DEFAULT_CONFIG, logFailures, runBinarize } from "../index";

class CaptureTransport extends Transport {
  readonly lines: string[] = [];
  private waiting: Array<{ count: number; resolve: () => void }> = [];

  override log(info: Record<string | symbol, unknown>, next: () => void): void {
    this.lines.push(String(info[Symbol.for("message")]));
    this.waiting = this.waiting.filter(({ count, resolve }) => {
      if (this.lines.length < count) return true;
      resolve();
      return false;
    });
    next();
  }

  received(count: number): Promise<void> {
    if (this.lines.length >= count) return Promise.resolve();
    return new Promise((resolve) => this.waiting.push({ count, resolve }));
  }
}

test("failures are logged at warn with their line number", async () => {
  const transport = new CaptureTransport();
  const logger = createLogger("warn", transport);
  const result = runBinarize("(TOP (NN a))\n(TOP (NP (NN a)\n(S (NN b))\n", {
    ...DEFAULT_CONFIG,
    removeEmpty: false,
    mask: false,
  });

  logger.info(result.summary);
  logFailures(logger, result.failures);
  await transport.received(2);

  expect(transport.lines).toHaveLength(2);
  expect(transport.lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z\|WARN\| line 2: unbalanced parentheses: node 'NP' is not closed$/);
  expect(transport.lines[1]).toMatch(/\|WARN\| line 3: root label 'S' is not the top label 'TOP'$/);
});
