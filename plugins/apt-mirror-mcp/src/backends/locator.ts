// Geolocation used to narrow mirror lists to the caller's country.
import { z } from "zod";
import type { Prober } from "../http/probe-client.js";
import { logger } from "../logger.js";

export const GEOLOCATION_SERVICES = [
  { url: "https://ipapi.co/json", field: "country_name", timeoutMs: 2_000 },
  { url: "http://ip-api.com/json", field: "country", timeoutMs: 5_000 },
] as const;

const countryReply = z.record(z.unknown());

/**
 * Country name of the public IP, or null when no service answers.
 * Failure here only widens discovery to the worldwide lists.
 */
export async function locateCountry(prober: Prober, signal?: AbortSignal): Promise<string | null> {
  for (const service of GEOLOCATION_SERVICES) {
    const outcome = await prober.probe(service.url, { timeoutMs: service.timeoutMs, signal });
    if (outcome.kind !== "success") {
      logger.debug({ url: service.url, outcome: outcome.kind }, "Geolocation service did not answer");
      continue;
    }
    const country = readField(outcome.body, service.field);
    if (country) {
      logger.info({ country, url: service.url }, "Found location");
      return country;
    }
  }
  logger.warn("Could not determine country; using worldwide mirror lists");
  return null;
}

function readField(body: string, field: string): string | null {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    logger.debug({ err }, "Geolocation reply is not JSON");
    return null;
  }
  const parsed = countryReply.safeParse(json);
  if (!parsed.success) return null;
  const value = parsed.data[field];
  return typeof value === "string" && value.trim() !== "" ? value.trim() : null;
}
