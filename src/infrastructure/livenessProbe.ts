import net from "net";
import type { LivenessProbe, ProbeResult } from "../domain/ports.js";

/** Splits `host:port` or `[v6]:port`. */
export function splitAddress(address: string): { host: string; port: number } | undefined {
  const bracketed = /^\[([^\]]+)\]:(\d+)$/.exec(address);
  const plain = /^([^:]+):(\d+)$/.exec(address);
  const m = bracketed ?? plain;
  if (!m) return undefined;
  const port = Number(m[2]);
  if (port <= 0 || port > 65535) return undefined;
  return { host: m[1], port };
}

/** Opens (and immediately closes) a TCP connection to the target. */
export function createTcpProbe(timeoutMs = 3000): LivenessProbe {
  return {
    check(address) {
      const target = splitAddress(address);
      if (!target) return Promise.resolve({ reachable: false, error: `invalid address '${address}'` });

      return new Promise<ProbeResult>((resolve) => {
        const socket = net.createConnection({ host: target.host, port: target.port });
        const done = (result: ProbeResult) => {
          socket.destroy();
          resolve(result);
        };
        socket.setTimeout(timeoutMs);
        socket.once("connect", () => done({ reachable: true }));
        socket.once("timeout", () => done({ reachable: false, error: `connection to ${address} timed out after ${timeoutMs}ms` }));
        socket.once("error", (e) => done({ reachable: false, error: `${address}: ${e.message}` }));
      });
    },
  };
}
