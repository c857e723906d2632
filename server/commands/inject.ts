import { Command } from "commander";
import { z } from "zod";

const InjectResponseSchema = z.object({
  message: z.string().optional(),
  error: z.string().optional(),
});

export interface InjectResult {
  ok: boolean;
  status: number;
  message: string;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export async function injectCommand(
  baseUrl: string,
  sessionId: string,
  command: string,
  fetchImpl: FetchLike = fetch
): Promise<InjectResult> {
  const url = new URL("/api/pty/command", baseUrl).toString();
  const res = await fetchImpl(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ sessionId, command }),
  });

  const parsed = InjectResponseSchema.safeParse(await res.json().catch(() => ({})));
  const body = parsed.success ? parsed.data : {};

  return {
    ok: res.ok,
    status: res.status,
    message: body.message ?? body.error ?? `HTTP ${res.status}`,
  };
}

const InjectOptionsSchema = z.object({ url: z.string().url() });

export function injectCommandCommand(): Command {
  return new Command("inject")
    .description("Type a command into a running terminal session")
    .argument("<sessionId>", "Session id, as listed by GET /api/sessions")
    .argument("<command>", "Command text; a newline is appended")
    .option("-u, --url <base>", "Server base URL", "http://127.0.0.1:8080")
    .action(async (sessionId: string, command: string, rawOptions: unknown) => {
      const { url } = InjectOptionsSchema.parse(rawOptions);
      const result = await injectCommand(url, sessionId, command);
      if (result.ok) {
        console.log(result.message);
      } else {
        console.error(result.message);
        process.exitCode = 1;
      }
    });
}
