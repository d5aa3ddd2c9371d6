import os from 'node:os';
import type { HealthProbe, ReachabilitySource } from '../core/connectivity.js';

type InterfaceMap = ReturnType<typeof os.networkInterfaces>;

/** True when at least one non-loopback interface has an address. */
export function hasExternalInterface(interfaces: InterfaceMap) {
  return Object.values(interfaces).some((addrs) => (addrs ?? []).some((addr) => !addr.internal));
}

/**
 * Polls the host's network interfaces. Emits a sample on start and then
 * every `pollMs`; the monitor drops repeated levels.
 */
export class InterfaceReachabilitySource implements ReachabilitySource {
  constructor(
    private readonly pollMs = 5_000,
    private readonly readInterfaces: () => InterfaceMap = os.networkInterfaces
  ) {}

  start(onSample: (reachable: boolean) => void) {
    const sample = () => onSample(hasExternalInterface(this.readInterfaces()));
    sample();
    const timer = setInterval(sample, this.pollMs);
    timer.unref();
    return () => clearInterval(timer);
  }
}

/**
 * HEAD request against the service health endpoint; any 2xx counts as up.
 */
export function createHttpHealthProbe(url: string, timeoutMs = 5_000): HealthProbe {
  return async () => {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await fetch(url, { method: 'HEAD', signal: controller.signal });
      return res.ok;
    } catch {
      return false;
    } finally {
      clearTimeout(timeout);
    }
  };
}
