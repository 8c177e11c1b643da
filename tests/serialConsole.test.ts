import { afterEach, describe, expect, it } from "vitest";
import net from "net";
import { SerialConsole, SerialTimeoutError } from "../src/session/serialConsole";

let server: net.Server | null = null;
let serial: SerialConsole | null = null;

afterEach(async () => {
  serial?.close();
  serial = null;
  const current = server;
  server = null;
  if (current) await new Promise<void>((resolve) => current.close(() => resolve()));
});

/** In-process stand-in for the emulator's serial port: a tiny line-echoing shell. */
function startGuest(onLine: (line: string, socket: net.Socket) => void): Promise<number> {
  return new Promise((resolve, reject) => {
    const guest = net.createServer((socket) => {
      socket.setEncoding("utf8");
      socket.write("booting...\r\nguest:~# ");
      let buffer = "";
      socket.on("data", (chunk: string) => {
        buffer += chunk;
        let newline = buffer.indexOf("\n");
        while (newline !== -1) {
          onLine(buffer.slice(0, newline), socket);
          buffer = buffer.slice(newline + 1);
          newline = buffer.indexOf("\n");
        }
      });
    });
    server = guest;
    guest.once("error", reject);
    guest.listen(0, "127.0.0.1", () => {
      const address = guest.address();
      if (address && typeof address === "object") resolve(address.port);
      else reject(new Error("no port assigned"));
    });
  });
}

describe("SerialConsole", () => {
  it("waits for the prompt, sends a line and sees the reply", async () => {
    const port = await startGuest((line, socket) => {
      socket.write(`${line}\r\nhi\r\n__EXIT:0__\r\nguest:~# `);
    });

    serial = await SerialConsole.connect(port, 3, 50);
    await serial.waitUntil((text) => text.includes(":~#"), 2000, "the prompt");
    serial.send("/usr/tests/a; echo __EXIT:$?__");
    await serial.waitUntil((text) => text.includes("__EXIT:0__"), 2000, "the exit marker");

    expect(serial.transcript).toContain("hi\r\n__EXIT:0__");
  });

  it("times out with a SerialTimeoutError", async () => {
    const port = await startGuest(() => undefined);
    serial = await SerialConsole.connect(port, 3, 50);

    const wait = serial.waitUntil((text) => text.includes("never"), 100, "a marker that never comes");

    await expect(wait).rejects.toBeInstanceOf(SerialTimeoutError);
    await expect(wait).rejects.toThrow("timed out after 100 ms waiting for a marker that never comes");
  });

  it("gives up after the configured number of attempts", async () => {
    const port = await startGuest(() => undefined);
    const current = server;
    server = null;
    if (current) await new Promise<void>((resolve) => current.close(() => resolve()));

    await expect(SerialConsole.connect(port, 2, 20)).rejects.toThrow(`unable to connect to serial port ${port}:`);
  });
});
