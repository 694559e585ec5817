import { z } from "zod";
import { type ProbeResult, failed, ok, settle } from "../lib/probe";
import type { GeoSummary } from "../types/diagnostics";
import { type HttpProbeOptions, getJson } from "./http";

const GEO_FIELDS = "status,message,country,countryCode,regionName,city,lat,lon,isp,org";

const text = z.string().nullish();
const coordinate = z.number().nullish();

const ipApiSchema = z.object({
  status: z.string(),
  message: text,
  country: text,
  countryCode: text,
  regionName: text,
  city: text,
  lat: coordinate,
  lon: coordinate,
  isp: text,
  org: text
});

export async function locateIp(ip: string, opts: HttpProbeOptions & { baseUrl: string }): Promise<ProbeResult<GeoSummary>> {
  return settle("geo failed", async () => {
    const response = await getJson(`${opts.baseUrl}/${encodeURIComponent(ip)}?fields=${GEO_FIELDS}`, opts);
    if (!response.ok) return failed(`geo failed: status ${response.status}`);
    const body = ipApiSchema.parse(response.body);
    if (body.status !== "success") return failed(`geo failed: ${body.message ?? "lookup unsuccessful"}`);
    return ok({
      country: body.country ?? null,
      country_code: body.countryCode ? body.countryCode.toUpperCase() : null,
      region: body.regionName ?? null,
      city: body.city ?? null,
      lat: body.lat ?? null,
      lon: body.lon ?? null,
      isp: body.isp ?? null,
      org: body.org ?? null
    });
  });
}
