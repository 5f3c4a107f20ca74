import { Duplex } from "node:stream";
import { ConnectionError, type SocketTarget } from "@gitwire/smart-http";
import { describe, expect, it, vi } from "vitest";
import { NodeTcpSocket } from "../src/node-tcp-socket.js";

const target: SocketTarget = { host: "example.com", port: 80, secure: false };

/**
 * Duplex that records writes and serves `response` to its reader.
 */
function cannedDuplex(response: string[], written: Buffer[] = []): Duplex {
  const duplex = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      written.push(chunk);
      callback();
    },
  });
  for (const chunk of response) {
    duplex.push(chunk);
  }
  duplex.push(null);
  return duplex;
}

async function collect(chunks: AsyncIterable<Uint8Array>): Promise<string> {
  let result = "";
  for await (const chunk of chunks) {
    result += Buffer.from(chunk).toString("latin1");
  }
  return result;
}

describe("NodeTcpSocket", () => {
  it("should dial the target with the connection options", async () => {
    const dial = vi.fn(async () => cannedDuplex([]));
    const socket = new NodeTcpSocket(target, { timeout: 5000, rejectUnauthorized: false, dial });

    await socket.connect();
    await socket.connect();

    expect(dial).toHaveBeenCalledTimes(1);
    expect(dial).toHaveBeenCalledWith(target, { timeout: 5000, rejectUnauthorized: false });
  });

  it("should write to and read from the connection", async () => {
    const written: Buffer[] = [];
    const socket = new NodeTcpSocket(target, {
      dial: async () => cannedDuplex(["HTTP/1.0 200 OK\r\n", "\r\nbody"], written),
    });

    await socket.connect();
    await socket.write(new TextEncoder().encode("GET / HTTP/1.0\r\n\r\n"));

    expect(Buffer.concat(written).toString("latin1")).toBe("GET / HTTP/1.0\r\n\r\n");
    expect(await collect(socket.read())).toBe("HTTP/1.0 200 OK\r\n\r\nbody");
  });

  it("should wrap dial failures", async () => {
    const refused = new Error("connect ECONNREFUSED");
    const socket = new NodeTcpSocket(target, {
      dial: async () => {
        throw refused;
      },
    });

    const error = await socket.connect().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({ message: "failed to connect to example.com:80", cause: refused });
  });

  it("should wrap read failures", async () => {
    const duplex = new Duplex({
      read() {},
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    duplex.push("partial");
    const socket = new NodeTcpSocket(target, { dial: async () => duplex });
    await socket.connect();

    const chunks = socket.read();
    const first = await chunks.next();
    duplex.destroy(new Error("read ECONNRESET"));
    const failure = await chunks.next().catch((e: unknown) => e);

    expect(first.done).toBe(false);
    expect(failure).toBeInstanceOf(ConnectionError);
    expect(failure).toMatchObject({ message: "failed to read from socket" });
  });

  it("should report an error raised while the socket was idle", async () => {
    const duplex = cannedDuplex([]);
    const socket = new NodeTcpSocket(target, { dial: async () => duplex });
    await socket.connect();

    const timeout = new ConnectionError("socket timed out after 10ms");
    duplex.destroy(timeout);
    await new Promise<void>((resolve) => setImmediate(resolve));

    const error = await socket.write(new Uint8Array(1)).catch((e: unknown) => e);
    expect(error).toMatchObject({ message: "connection failed", cause: timeout });
  });

  it("should refuse I/O before connect and after close", async () => {
    const duplex = cannedDuplex([]);
    const socket = new NodeTcpSocket(target, { dial: async () => duplex });

    await expect(socket.write(new Uint8Array(1))).rejects.toThrow("Not connected");

    await socket.connect();
    await socket.close();

    expect(duplex.destroyed).toBe(true);
    await expect(socket.write(new Uint8Array(1))).rejects.toThrow("Socket is closed");
    await expect(socket.connect()).rejects.toThrow("Socket is closed");
  });
});
