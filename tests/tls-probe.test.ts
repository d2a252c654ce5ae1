import { describe, it, expect, afterEach } from "vitest";
import * as net from "net";
import type { AddressInfo } from "net";
import { checkTls, createCertificateProbe, tlsTarget } from "../server/diagnosis/tls-probe";

interface FixtureServer {
  port: number;
  connections: net.Socket[];
  close(): Promise<void>;
}

let fixture: FixtureServer | null = null;

async function startServer(onConnection: (socket: net.Socket) => void): Promise<FixtureServer> {
  const connections: net.Socket[] = [];
  const server = net.createServer((socket) => {
    connections.push(socket);
    socket.on("error", () => undefined);
    onConnection(socket);
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server did not bind a port");
  const { port }: AddressInfo = address;

  return {
    port,
    connections,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const socket of connections) socket.destroy();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

afterEach(async () => {
  await fixture?.close();
  fixture = null;
});

describe("tlsTarget", () => {
  it("sends the host name as SNI", () => {
    expect(tlsTarget("example.com")).toEqual({ host: "example.com", servername: "example.com" });
  });

  it("connects to IP literals without SNI and without URL brackets", () => {
    expect(tlsTarget("[2001:db8::1]")).toEqual({ host: "2001:db8::1" });
    expect(tlsTarget("192.0.2.10")).toEqual({ host: "192.0.2.10" });
  });
});

describe("certificate check over a real socket", () => {
  it("fails within the timeout when the server never answers the handshake", async () => {
    fixture = await startServer(() => undefined);
    const checkCertificate = createCertificateProbe({ port: fixture.port });

    const started = Date.now();
    const result = await checkTls({ scheme: "https", domain: "127.0.0.1" }, 300, checkCertificate);
    const elapsed = Date.now() - started;

    expect(result).toEqual({ status: "failed", reason: "TLS handshake timed out after 300ms" });
    expect(elapsed).toBeGreaterThanOrEqual(250);
    expect(elapsed).toBeLessThan(2000);
  });

  it("keeps the deadline absolute while the server trickles bytes", async () => {
    // A handshake record header announcing 16 KiB, then its body one byte at a time.
    fixture = await startServer((socket) => {
      socket.write(Buffer.from([0x16, 0x03, 0x03, 0x40, 0x00]));
      const timer = setInterval(() => socket.write(Buffer.from([0x00])), 50);
      socket.on("close", () => clearInterval(timer));
    });
    const checkCertificate = createCertificateProbe({ port: fixture.port });

    const started = Date.now();
    const result = await checkTls({ scheme: "https", domain: "127.0.0.1" }, 300, checkCertificate);

    expect(result).toEqual({ status: "failed", reason: "TLS handshake timed out after 300ms" });
    expect(Date.now() - started).toBeLessThan(2000);
  });

  it("fails when the server hangs up during the handshake", async () => {
    fixture = await startServer((socket) => socket.destroy());
    const checkCertificate = createCertificateProbe({ port: fixture.port });

    const result = await checkTls({ scheme: "https", domain: "127.0.0.1" }, 5000, checkCertificate);

    expect(result.status).toBe("failed");
  });

  it("closes its socket once the check has settled", async () => {
    fixture = await startServer(() => undefined);
    const server = fixture;
    const checkCertificate = createCertificateProbe({ port: server.port });

    await checkTls({ scheme: "https", domain: "127.0.0.1" }, 200, checkCertificate);
    await new Promise<void>((resolve) => {
      const socket = server.connections[0];
      if (socket.destroyed) resolve();
      else socket.once("close", () => resolve());
    });

    expect(server.connections).toHaveLength(1);
    expect(server.connections[0].destroyed).toBe(true);
  });
});
