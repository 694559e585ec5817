import test from "node:test";
import assert from "node:assert/strict";
import request from "supertest";
import { createApp } from "../app";
import { NOW, fakeDns, fakeFetch, fakeHandshake, json, testSettings } from "./fakes";

function quietApp() {
  const { fetchImpl } = fakeFetch({ "https://rdap.test/": () => json({}, 404) });
  return createApp({
    settings: testSettings,
    deps: { dns: fakeDns(), fetchImpl, handshake: fakeHandshake({}).handshake },
    now: NOW,
    logRequests: false
  });
}

test("GET /health reports the service", async () => {
  const res = await request(quietApp()).get("/health");
  assert.equal(res.status, 200);
  assert.equal(res.body.ok, true);
  assert.equal(res.body.service, "email-risk-diagnostics");
});

test("POST /api/email/diagnose returns the diagnostic result", async () => {
  const res = await request(quietApp()).post("/api/email/diagnose").send({ email: "someone@quiet.example" });
  assert.equal(res.status, 200);
  assert.equal(res.body.domain, "quiet.example");
  assert.equal(res.body.risk_score, 55);
  assert.equal(res.body.risk_label, "High");
  assert.equal(res.body.dns, undefined);
});

test("POST /api/email/diagnose includes verbose blocks on request", async () => {
  const res = await request(quietApp()).post("/api/email/diagnose").send({ email: "someone@quiet.example", verbose: true });
  assert.equal(res.status, 200);
  assert.deepEqual(res.body.dns, { A: [], AAAA: [], MX: [] });
});

test("POST /api/email/diagnose rejects bodies that fail validation", async () => {
  const res = await request(quietApp()).post("/api/email/diagnose").send({ email: "x" });
  assert.equal(res.status, 400);
  assert.equal(res.body.error, "Validation error");
  assert.equal(res.body.requestId, res.headers["x-request-id"]);
});

test("POST /api/email/diagnose maps malformed addresses to 400", async () => {
  const res = await request(quietApp()).post("/api/email/diagnose").send({ email: "no-at-sign" });
  assert.equal(res.status, 400);
  assert.equal(res.body.error, "Provide an email like name@example.com");
});

test("unknown routes return 404", async () => {
  const res = await request(quietApp()).get("/api/nope");
  assert.equal(res.status, 404);
  assert.equal(res.body.error, "Route not found");
});
