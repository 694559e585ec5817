import test from "node:test";
import assert from "node:assert/strict";
import { locateIp } from "../services/geolocation";
import { fakeFetch, json } from "./fakes";

const opts = { timeoutMs: 1_000, baseUrl: "http://geo.test/json" };

test("locateIp normalises a successful lookup", async () => {
  const { fetchImpl, calls } = fakeFetch({
    "http://geo.test/json/": () =>
      json({
        status: "success",
        country: "Germany",
        countryCode: "de",
        regionName: "Hesse",
        city: "Frankfurt am Main",
        lat: 50.11,
        lon: 8.68,
        isp: "Example Hosting",
        org: "Example Org"
      })
  });

  const result = await locateIp("203.0.113.10", { ...opts, fetchImpl });

  assert.equal(
    calls[0].url,
    "http://geo.test/json/203.0.113.10?fields=status,message,country,countryCode,regionName,city,lat,lon,isp,org"
  );
  assert.deepEqual(result, {
    status: "ok",
    data: {
      country: "Germany",
      country_code: "DE",
      region: "Hesse",
      city: "Frankfurt am Main",
      lat: 50.11,
      lon: 8.68,
      isp: "Example Hosting",
      org: "Example Org"
    }
  });
});

test("locateIp carries the provider's failure message", async () => {
  const { fetchImpl } = fakeFetch({ "http://geo.test/": () => json({ status: "fail", message: "private range" }) });
  assert.deepEqual(await locateIp("10.0.0.1", { ...opts, fetchImpl }), { status: "error", error: "geo failed: private range" });
});

test("locateIp records HTTP and shape errors", async () => {
  const broken = fakeFetch({ "http://geo.test/": () => json({}, 500) });
  assert.deepEqual(await locateIp("203.0.113.10", { ...opts, fetchImpl: broken.fetchImpl }), {
    status: "error",
    error: "geo failed: status 500"
  });

  const garbled = fakeFetch({ "http://geo.test/": () => json({ status: 5 }) });
  assert.deepEqual(await locateIp("203.0.113.10", { ...opts, fetchImpl: garbled.fetchImpl }), {
    status: "error",
    error: "geo failed: unexpected response shape (status)"
  });
});
