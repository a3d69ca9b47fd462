/**
 * Terminal Browser Example
 *
 * A line-driven Gemini browser. Type an address to visit it, a link number
 * to follow a link, "b" to go back, "c" to cancel the current request and
 * "q" to quit.
 */

import * as path from 'path';
import * as readline from 'readline';
import { geminiClient, createLogger, LogLevel, READY_STATUS } from '../src';
import type { GemtextElement, GemtextLink, PresentationSink } from '../src';

/**
 * Prints pages to stdout and reads answers to prompts from the same
 * readline interface as the commands.
 */
class TerminalSink implements PresentationSink {
  private readonly rl: readline.Interface;
  private links: GemtextLink[] = [];
  private pendingAnswer?: (answer: string | null) => void;

  constructor(rl: readline.Interface) {
    this.rl = rl;
  }

  /** Hands a typed line to a waiting prompt. Returns false if none was waiting. */
  answer(line: string): boolean {
    const resolve = this.pendingAnswer;
    if (!resolve) {
      return false;
    }
    this.pendingAnswer = undefined;
    resolve(line === '' ? null : line);
    return true;
  }

  linkAt(index: number): GemtextLink | undefined {
    return this.links[index - 1];
  }

  clear(): void {
    this.links = [];
    process.stdout.write('\n');
  }

  insertElement(element: GemtextElement): void {
    switch (element.type) {
      case 'link':
        this.links.push(element);
        process.stdout.write(`[${this.links.length}] ${element.label}`);
        break;
      case 'heading':
      case 'text':
        process.stdout.write(element.text);
        break;
    }
  }

  insertRawText(text: string): void {
    process.stdout.write(text);
  }

  setAddress(address: string): void {
    this.rl.setPrompt(`${address}> `);
  }

  setStatusMessage(message: string): void {
    if (message === READY_STATUS) {
      process.stdout.write('\n');
      this.rl.prompt();
      return;
    }
    console.log(`-- ${message}`);
  }

  promptUser(title: string, message: string): Promise<string | null> {
    console.log(`\n${title}: ${message} (empty line cancels)`);
    return this.waitForAnswer();
  }

  async chooseSaveDestination(suggestedName?: string): Promise<string | null> {
    const name = suggestedName ?? 'download';
    console.log(`\nSave ${name} as (empty line cancels):`);
    const answer = await this.waitForAnswer();
    return answer === null ? null : path.resolve(answer);
  }

  showErrorDialog(message: string): void {
    console.error(`Error: ${message}`);
  }

  private waitForAnswer(): Promise<string | null> {
    this.pendingAnswer?.(null);
    return new Promise((resolve) => {
      this.pendingAnswer = resolve;
    });
  }
}

async function main(): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const sink = new TerminalSink(rl);

  // Certificates are not verified: most capsules are self-signed
  const client = geminiClient()
    .sink(sink)
    .logger(createLogger(LogLevel.Warn))
    .connectTimeout(10000)
    .build();
  const input = client.inputHandlers();

  rl.setPrompt('> ');
  rl.prompt();

  rl.on('line', (raw) => {
    const line = raw.trim();
    if (sink.answer(line)) {
      return;
    }

    if (line === 'q') {
      rl.close();
      return;
    }
    if (line === 'b') {
      input.onBack();
      return;
    }
    if (line === 'c') {
      if (!client.cancel()) {
        rl.prompt();
      }
      return;
    }
    if (/^\d+$/.test(line)) {
      const link = sink.linkAt(Number(line));
      if (link) {
        input.onGo(link.target);
      } else {
        sink.showErrorDialog(`No link numbered ${line}`);
        rl.prompt();
      }
      return;
    }
    if (line) {
      input.onGo(line);
    } else {
      rl.prompt();
    }
  });

  await new Promise<void>((resolve) => rl.once('close', () => resolve()));
  client.close();

  const stats = client.getMetrics();
  console.log(`\nVisited ${stats.requestsCompleted} page(s), ${stats.requestsFailed} failed.`);
}

main().catch(console.error);
