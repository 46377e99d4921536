import { ProxyAgent, type Dispatcher } from "undici";

/** Subset of process.env consulted for proxy settings. */
export type ProxyEnv = Readonly<Record<string, string | undefined>>;

function envValue(env: ProxyEnv, name: string): string | undefined {
  const value = env[name] ?? env[name.toLowerCase()];
  return value && value.trim() !== "" ? value.trim() : undefined;
}

/** True when `NO_PROXY` lists the host (exact or domain-suffix match) or is `*`. */
export function bypassesProxy(hostname: string, noProxy: string | undefined): boolean {
  if (!noProxy) return false;
  const host = hostname.toLowerCase();
  for (const raw of noProxy.split(",")) {
    const entry = raw.trim().toLowerCase().replace(/:\d+$/, "");
    if (entry === "") continue;
    if (entry === "*") return true;
    const suffix = entry.startsWith(".") ? entry : `.${entry}`;
    if (host === entry.replace(/^\./, "") || host.endsWith(suffix)) return true;
  }
  return false;
}

/**
 * Proxy URL for `url` per HTTPS_PROXY / HTTP_PROXY / NO_PROXY (either case),
 * or null for a direct connection. The environment is only read.
 */
export function resolveProxy(url: string, env: ProxyEnv = process.env): string | null {
  const target = new URL(url);
  if (bypassesProxy(target.hostname, envValue(env, "NO_PROXY"))) return null;
  const proxy = target.protocol === "https:" ? envValue(env, "HTTPS_PROXY") : envValue(env, "HTTP_PROXY");
  return proxy ?? null;
}

/** Caches one ProxyAgent per proxy URL. */
export class ProxyDispatchers {
  private readonly agents = new Map<string, ProxyAgent>();

  constructor(private readonly env: ProxyEnv = process.env) {}

  forUrl(url: string): Dispatcher | undefined {
    const proxy = resolveProxy(url, this.env);
    if (!proxy) return undefined;
    let agent = this.agents.get(proxy);
    if (!agent) {
      agent = new ProxyAgent(proxy);
      this.agents.set(proxy, agent);
    }
    return agent;
  }

  async close(): Promise<void> {
    await Promise.all([...this.agents.values()].map((agent) => agent.close()));
    this.agents.clear();
  }
}
