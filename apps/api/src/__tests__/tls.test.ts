import { readFile, mkdtemp, rm, writeFile } from "node:fs/promises";
import { request } from "node:https";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { buildApp } from "../app.js";
import { TlsConfigError } from "../lib/errors.js";
import { loadTlsMaterial } from "../lib/tls.js";

// Self-signed pairs for CN=localhost / 127.0.0.1
const fixture = (name: string) =>
  fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

const SERVER_CERT = fixture("server.crt");
const SERVER_KEY = fixture("server.key");
const OTHER_KEY = fixture("other.key");

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "compute-bench-tls-"));
  await writeFile(join(dir, "garbage.crt"), "not a certificate\n");
  await writeFile(join(dir, "garbage.key"), "not a key\n");
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

function httpsGet(
  url: string,
  ca: Buffer,
): Promise<{ statusCode: number; body: string }> {
  return new Promise((resolve, reject) => {
    const req = request(url, { method: "GET", ca }, (res) => {
      let body = "";
      res.setEncoding("utf8");
      res.on("data", (chunk: string) => {
        body += chunk;
      });
      res.on("end", () => resolve({ statusCode: res.statusCode ?? 0, body }));
      res.on("error", reject);
    });
    req.on("error", reject);
    req.end();
  });
}

describe("loadTlsMaterial", () => {
  it("loads a matching certificate and key", async () => {
    const material = await loadTlsMaterial(SERVER_CERT, SERVER_KEY);

    expect(material.cert.equals(await readFile(SERVER_CERT))).toBe(true);
    expect(material.key.equals(await readFile(SERVER_KEY))).toBe(true);
    expect(Object.isFrozen(material)).toBe(true);
  });

  it("fails when the key does not match the certificate", async () => {
    const error = await loadTlsMaterial(SERVER_CERT, OTHER_KEY).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(TlsConfigError);
    expect(error).toMatchObject({
      message: expect.stringContaining(
        `invalid TLS material (cert: ${SERVER_CERT}, key: ${OTHER_KEY})`,
      ),
    });
  });

  it("fails when the certificate file is missing", async () => {
    const certPath = join(dir, "missing.crt");
    const keyPath = join(dir, "garbage.key");

    const error = await loadTlsMaterial(certPath, keyPath).catch(
      (err: unknown) => err,
    );
    expect(error).toBeInstanceOf(TlsConfigError);
    expect(error).toMatchObject({
      message: expect.stringContaining(
        `failed to read TLS material (cert: ${certPath}, key: ${keyPath})`,
      ),
    });
  });

  it("fails when the key file is missing", async () => {
    await expect(
      loadTlsMaterial(join(dir, "garbage.crt"), join(dir, "missing.key")),
    ).rejects.toBeInstanceOf(TlsConfigError);
  });

  it("fails on malformed PEM", async () => {
    const certPath = join(dir, "garbage.crt");
    const keyPath = join(dir, "garbage.key");

    const error = await loadTlsMaterial(certPath, keyPath).catch(
      (err: unknown) => err,
    );
    expect(error).toBeInstanceOf(TlsConfigError);
    expect(error).toMatchObject({
      message: expect.stringContaining(
        `invalid TLS material (cert: ${certPath}, key: ${keyPath})`,
      ),
    });
  });
});

describe("HTTPS listener", () => {
  it("serves the API over TLS with the loaded material", async () => {
    const tls = await loadTlsMaterial(SERVER_CERT, SERVER_KEY);
    const app = await buildApp({
      env: { LOG_LEVEL: "silent", COMPUTE_POOL_SIZE: 1 },
      tls,
    });

    try {
      const address = await app.listen({ port: 0, host: "127.0.0.1" });
      expect(address.startsWith("https://127.0.0.1:")).toBe(true);

      const res = await httpsGet(
        `${address}/api/compute/fibonacci?n=50`,
        tls.cert,
      );
      expect(res.statusCode).toBe(200);
      expect(res.body).toBe(
        '{"n":50,"result":12586269025,"message":"Fibonacci number at position 50"}',
      );
    } finally {
      await app.close();
    }
  });
});
