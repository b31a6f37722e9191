import { spawn, execFile } from "node:child_process";
import { promisify } from "node:util";
import type { IAgentAdapter, AgentReply, AgentInvokeOptions, TokenUsage } from "./base.js";
import { calculateTimeout } from "./base.js";
import { isRecord } from "./http.js";
import type { AgentConfig } from "../config.js";
import { AgentInvocationError } from "../errors.js";
import { createLogger } from "../logger.js";

const execFileAsync = promisify(execFile);
const log = createLogger("cli");

/** Build a clean env without Claude Code session markers so nested invocations work. */
function cleanEnv(): NodeJS.ProcessEnv {
  const env = { ...process.env };
  delete env.CLAUDECODE;
  delete env.CLAUDE_CODE_ENTRYPOINT;
  return env;
}

function numberField(obj: Record<string, unknown>, key: string): number | undefined {
  const value = obj[key];
  return typeof value === "number" ? value : undefined;
}

/**
 * Adapter for CLI agents. Defaults to `claude -p --output-format json`;
 * any command that reads a prompt on stdin and prints the answer works.
 */
export class ClaudeAdapter implements IAgentAdapter {
  readonly name: string;
  private readonly command: string;
  private readonly baseArgs: string[];

  constructor(config: AgentConfig) {
    this.name = config.name;
    this.command = config.command ?? "claude";
    this.baseArgs = config.args.length > 0 ? config.args : ["-p", "--output-format", "json"];
  }

  async isAvailable(): Promise<boolean> {
    try {
      await execFileAsync(this.command, ["--version"], { timeout: 5000, env: cleanEnv() });
      log.debug(this.name, "isAvailable: true");
      return true;
    } catch {
      log.debug(this.name, "isAvailable: false");
      return false;
    }
  }

  /** Spawn the command with the prompt on stdin — avoids arg-size limits and exec quirks. */
  private spawnWithStdin(args: string[], input: string, timeoutMs: number, signal?: AbortSignal): Promise<string> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new AgentInvocationError(this.name, "cancelled", `${this.name}: aborted before start`));
        return;
      }

      const child = spawn(this.command, args, {
        env: cleanEnv(),
        stdio: ["pipe", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      let settled = false;

      const kill = () => {
        child.kill("SIGTERM");
        // Escalate to SIGKILL after 2s if still alive
        const killTimer = setTimeout(() => { child.kill("SIGKILL"); }, 2000);
        killTimer.unref();
      };

      const finish = (err: Error | null, out?: string) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        if (err) reject(err);
        else resolve(out ?? "");
      };

      const onAbort = () => {
        kill();
        finish(new AgentInvocationError(this.name, "cancelled", `${this.name}: aborted`));
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      const timer = setTimeout(() => {
        kill();
        finish(new AgentInvocationError(this.name, "timeout", `${this.command} timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      child.stdout.on("data", (d) => (stdout += d));
      child.stderr.on("data", (d) => (stderr += d));
      child.on("error", (err) => {
        finish(new AgentInvocationError(this.name, "transport", `${this.command}: ${err.message}`, { cause: err }));
      });
      child.on("close", (code) => {
        if (code !== 0) {
          finish(new AgentInvocationError(this.name, "provider",
            stderr.trim() || `${this.command} exited with code ${code}`));
        } else {
          finish(null, stdout);
        }
      });

      // EPIPE when the command exits before reading its prompt; "close" reports the exit code.
      child.stdin.on("error", (err) => {
        if ("code" in err && err.code === "EPIPE") {
          log.debug(this.name, "stdin closed early:", err.message);
          return;
        }
        finish(new AgentInvocationError(this.name, "transport", `${this.command} stdin: ${err.message}`, { cause: err }));
      });
      child.stdin.write(input);
      child.stdin.end();
    });
  }

  async invoke(options: AgentInvokeOptions): Promise<AgentReply> {
    const { prompt, systemPrompt, signal } = options;
    const timeoutMs = options.timeoutMs ?? calculateTimeout(prompt.length, "cli");
    const start = Date.now();

    const args = [...this.baseArgs];
    if (systemPrompt) {
      args.push("--system-prompt", systemPrompt);
    }

    log.debug(this.name, "invoke start, prompt length:", prompt.length,
      systemPrompt ? `(+ system-prompt ${systemPrompt.length} chars)` : "");

    const stdout = await this.spawnWithStdin(args, prompt, timeoutMs, signal);
    const durationMs = Date.now() - start;

    let content = stdout.trim();
    let raw: unknown = stdout;
    let tokens: TokenUsage | undefined;

    try {
      const obj: unknown = JSON.parse(stdout);
      raw = obj;
      if (isRecord(obj)) {
        // Claude Code JSON output: { result, total_cost_usd, usage: { input_tokens, output_tokens, ... }, ... }
        if ("result" in obj) content = String(obj.result).trim();
        if (obj.is_error === true) {
          throw new AgentInvocationError(this.name, "provider", `${this.name}: ${content || "CLI reported an error"}`);
        }

        const usage = isRecord(obj.usage) ? obj.usage : undefined;
        const costUsd = numberField(obj, "total_cost_usd") ?? numberField(obj, "cost_usd");
        if (usage || costUsd !== undefined) {
          tokens = {
            inputTokens: (usage && numberField(usage, "input_tokens")) ?? 0,
            outputTokens: (usage && numberField(usage, "output_tokens")) ?? 0,
            costUsd,
          };
        }
      }
    } catch (err) {
      if (err instanceof AgentInvocationError) throw err;
      log.debug(this.name, "stdout is not JSON, using raw text");
    }

    log.info(this.name, "invoke complete:", durationMs + "ms" +
      (tokens?.costUsd ? ", $" + tokens.costUsd.toFixed(4) : ""));

    return { content, tokens, raw, durationMs };
  }
}
