import { type ChildProcess, spawn } from "node:child_process";
import * as fs from "node:fs/promises";
import * as net from "node:net";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

const CLI_PATH = fileURLToPath(new URL("../index.ts", import.meta.url));

interface ServerHandle {
  proc: ChildProcess;
  port: number;
  output: string;
}

const procs = new Set<ChildProcess>();

function spawnCli(args: string[]): ChildProcess {
  const proc = spawn(process.execPath, ["--import", "tsx", CLI_PATH, ...args], {
    stdio: ["pipe", "pipe", "pipe"],
  });
  procs.add(proc);
  proc.on("close", () => procs.delete(proc));
  return proc;
}

function startServer(root: string, args: string[] = []): Promise<ServerHandle> {
  return new Promise((resolve, reject) => {
    const proc = spawnCli([
      "--directory",
      root,
      "--port",
      "0",
      "--host",
      "127.0.0.1",
      ...args,
    ]);
    const handle: ServerHandle = { proc, port: 0, output: "" };

    const timer = setTimeout(
      () => reject(new Error("Server did not start in time")),
      10000,
    );

    proc.stdout?.on("data", (chunk: Buffer) => {
      handle.output += chunk.toString();
      const match = handle.output.match(/Serving .+ on http:\/\/[^:]+:(\d+)/);
      if (match) {
        clearTimeout(timer);
        handle.port = Number.parseInt(match[1], 10);
        resolve(handle);
      }
    });

    proc.stderr?.on("data", (chunk: Buffer) => {
      handle.output += chunk.toString();
    });

    proc.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });
  });
}

/** Run the CLI to completion and collect its output. */
function runCli(
  args: string[],
): Promise<{ code: number | null; stdout: string; stderr: string }> {
  return new Promise((resolve, reject) => {
    const proc = spawnCli(args);
    let stdout = "";
    let stderr = "";
    proc.stdout?.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    proc.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    proc.on("error", reject);
    proc.on("close", (code) => resolve({ code, stdout, stderr }));
  });
}

async function stopServer(handle: ServerHandle): Promise<void> {
  const closed = new Promise<void>((resolve) => {
    handle.proc.on("close", () => resolve());
  });
  handle.proc.kill("SIGINT");
  await closed;
}

let tmpDir: string;

beforeAll(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "linehttp-e2e-"));
  await fs.writeFile(path.join(tmpDir, "hello.txt"), "Hello, world!");
});

afterAll(async () => {
  for (const proc of procs) {
    proc.kill("SIGKILL");
  }
  procs.clear();
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe("linehttp CLI e2e", () => {
  it("serves files from --directory", async () => {
    const s = await startServer(tmpDir, ["-q"]);
    try {
      const res = await fetch(`http://127.0.0.1:${s.port}/files/hello.txt`);
      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("application/octet-stream");
      expect(await res.text()).toBe("Hello, world!");
    } finally {
      await stopServer(s);
    }
  });

  it("writes POSTed files into --directory", async () => {
    const s = await startServer(tmpDir, ["-q"]);
    try {
      const res = await fetch(`http://127.0.0.1:${s.port}/files/posted.txt`, {
        method: "POST",
        body: "from the client",
      });
      expect(res.status).toBe(201);
      expect(await fs.readFile(path.join(tmpDir, "posted.txt"), "utf-8")).toBe(
        "from the client",
      );
    } finally {
      await stopServer(s);
    }
  });

  it("drops a malformed request without answering", async () => {
    const s = await startServer(tmpDir, ["-q"]);
    try {
      const response = await new Promise<string>((resolve) => {
        const sock = net.createConnection(s.port, "127.0.0.1", () => {
          sock.write("NONSENSE\r\n\r\n");
        });
        let data = "";
        sock.on("data", (chunk) => {
          data += chunk.toString();
        });
        sock.on("close", () => resolve(data));
      });
      expect(response).toBe("");
    } finally {
      await stopServer(s);
    }
  });

  it("logs one line per request", async () => {
    const s = await startServer(tmpDir);
    try {
      await fetch(`http://127.0.0.1:${s.port}/echo/logged`);
      await new Promise((resolve) => setTimeout(resolve, 100));
      expect(s.output).toContain("[linehttp] GET /echo/logged -> 200 - 127.0.0.1");
    } finally {
      await stopServer(s);
    }
  });
});

describe("linehttp CLI flags", () => {
  it("prints the version", async () => {
    const result = await runCli(["--version"]);
    expect(result.code).toBe(0);
    expect(result.stdout.trim()).toBe("0.1.0");
  });

  it("exits with status 1 on an unknown option", async () => {
    const result = await runCli(["--bogus"]);
    expect(result.code).toBe(1);
    expect(result.stderr).toContain("Unknown option: --bogus");
  });

  it("exits with status 1 when the port is taken", async () => {
    const blocker = net.createServer();
    await new Promise<void>((resolve) => {
      blocker.listen(0, "127.0.0.1", () => resolve());
    });
    const address = blocker.address();
    const port = address && typeof address === "object" ? address.port : 0;

    try {
      const result = await runCli([
        "--port",
        String(port),
        "--host",
        "127.0.0.1",
      ]);
      expect(result.code).toBe(1);
      expect(result.stderr).toContain("EADDRINUSE");
    } finally {
      await new Promise<void>((resolve) => blocker.close(() => resolve()));
    }
  });
});

describe("linehttp CLI shutdown", () => {
  it("terminates on SIGTERM", async () => {
    const s = await startServer(tmpDir, ["-q"]);

    const res = await fetch(`http://127.0.0.1:${s.port}/echo/alive`);
    expect(res.status).toBe(200);

    const closed = new Promise<number | null>((resolve) => {
      s.proc.on("close", (code) => resolve(code));
    });
    s.proc.kill("SIGTERM");
    expect(await closed).toBe(0);

    await expect(
      fetch(`http://127.0.0.1:${s.port}/echo/alive`),
    ).rejects.toThrow();
  });
});
