import net from "net";

export class SerialTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SerialTimeoutError";
  }
}

interface Waiter {
  test: (transcript: string) => boolean;
  resolve: () => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function openSocket(port: number, host: string): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ port, host });
    socket.once("connect", () => {
      socket.off("error", reject);
      resolve(socket);
    });
    socket.once("error", reject);
  });
}

/**
 * A guest serial line exposed by the emulator as a TCP server. Everything
 * received is kept in `transcript`.
 */
export class SerialConsole {
  private text = "";
  private closed = false;
  private readonly waiters = new Set<Waiter>();

  private constructor(private readonly socket: net.Socket) {
    socket.setEncoding("utf8");
    socket.on("data", (chunk: string) => {
      this.text += chunk;
      for (const waiter of this.waiters) {
        if (waiter.test(this.text)) this.settle(waiter);
      }
    });
    socket.on("close", () => this.failAll(new Error("serial connection closed")));
    socket.on("error", (error) => this.failAll(error));
  }

  static async connect(port: number, retries: number, retryDelayMs = 1000, host = "127.0.0.1"): Promise<SerialConsole> {
    let lastError: unknown = null;
    for (let attempt = 0; attempt < retries; attempt += 1) {
      try {
        return new SerialConsole(await openSocket(port, host));
      } catch (error) {
        lastError = error;
        await delay(retryDelayMs);
      }
    }
    const reason = lastError instanceof Error ? lastError.message : "no attempts made";
    throw new Error(`unable to connect to serial port ${port}: ${reason}`);
  }

  get transcript(): string {
    return this.text;
  }

  waitUntil(test: (transcript: string) => boolean, timeoutMs: number, label: string): Promise<void> {
    if (test(this.text)) return Promise.resolve();
    if (this.closed) return Promise.reject(new Error(`serial connection closed before ${label}`));
    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        test,
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters.delete(waiter);
          reject(new SerialTimeoutError(`timed out after ${timeoutMs} ms waiting for ${label}`));
        }, timeoutMs)
      };
      this.waiters.add(waiter);
    });
  }

  send(line: string): void {
    this.socket.write(line.endsWith("\n") ? line : `${line}\n`);
  }

  close(): void {
    this.closed = true;
    this.socket.destroy();
  }

  private settle(waiter: Waiter): void {
    clearTimeout(waiter.timer);
    this.waiters.delete(waiter);
    waiter.resolve();
  }

  private failAll(error: Error): void {
    this.closed = true;
    for (const waiter of this.waiters) {
      clearTimeout(waiter.timer);
      waiter.reject(error);
    }
    this.waiters.clear();
  }
}
