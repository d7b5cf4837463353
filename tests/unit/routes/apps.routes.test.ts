/**
 * HTTP tests for the apps routes.
 *
 * The Express app listens on an ephemeral local port with an in-memory
 * registry and a fake functions platform behind it.
 */

import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { request } from "undici";

import { createApp } from "../../../src/app";
import { FunctionsApiError } from "../../../src/clients/functions.client";
import { createFakeFunctionsPlatform, type FakeFunctionsPlatform } from "../../helpers/fake-functions-platform";
import { InMemoryAppRegistry } from "../../helpers/in-memory-app-registry";
import { createSilentLogger } from "../../helpers/silent-logger";

describe("apps routes", () => {
  let server: Server;
  let baseUrl: string;
  let registry: InMemoryAppRegistry;
  let fake: FakeFunctionsPlatform;

  beforeEach(async () => {
    registry = new InMemoryAppRegistry();
    fake = createFakeFunctionsPlatform();
    const app = createApp({ registry, functions: fake.platform, logger: createSilentLogger() });

    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, "127.0.0.1", () => resolve(s));
    });
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("expected a TCP address");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  async function call(method: "GET" | "POST" | "PUT" | "DELETE", path: string, body?: unknown) {
    const res = await request(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? {} : { "content-type": "application/json" },
      body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body),
    });
    return { status: res.statusCode, body: await res.body.json() };
  }

  it("creates an app with the derived name and default description", async () => {
    const res = await call("POST", "/v1/p1/apps", { app: { name: "billing" } });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      app: { name: "billing-p1", project_id: "p1", description: "App for project p1", config: {} },
      message: "App successfully created",
    });
  });

  it("answers a second identical create with 409", async () => {
    const first = await call("POST", "/v1/p1/apps", { app: { name: "billing" } });
    const second = await call("POST", "/v1/p1/apps", { app: { name: "billing" } });

    expect(first.status).toBe(200);
    expect(second).toEqual({ status: 409, body: { error: { message: "App billing-p1 already exists" } } });
    expect(fake.platform.apps.create).toHaveBeenCalledTimes(1);
  });

  it("returns what was created on get", async () => {
    await call("POST", "/v1/p1/apps", { app: { name: "billing", description: "Invoices" } });
    const res = await call("GET", "/v1/p1/apps/billing-p1");

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      app: { name: "billing-p1", project_id: "p1", description: "Invoices" },
      message: "Successfully loaded app",
    });
  });

  it("lists the project's apps", async () => {
    await call("POST", "/v1/p1/apps", { app: { name: "billing" } });
    await call("POST", "/v1/p1/apps", { app: { name: "auth" } });

    const res = await call("GET", "/v1/p1/apps");
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      apps: [{ name: "billing-p1" }, { name: "auth-p1" }],
      message: "Successfully listed applications",
    });
  });

  it("lists nothing for an unknown project", async () => {
    const res = await call("GET", "/v1/p404/apps");
    expect(res).toEqual({ status: 200, body: { apps: [], message: "Successfully listed applications" } });
  });

  it("updates the remote app", async () => {
    await call("POST", "/v1/p1/apps", { app: { name: "billing" } });
    const res = await call("PUT", "/v1/p1/apps/billing-p1", { config: { LOG_LEVEL: "debug" } });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      app: { name: "billing-p1", config: { LOG_LEVEL: "debug" } },
      message: "App successfully updated",
    });
  });

  it("deletes an app without routes", async () => {
    await call("POST", "/v1/p1/apps", { app: { name: "billing" } });
    const res = await call("DELETE", "/v1/p1/apps/billing-p1");

    expect(res).toEqual({ status: 200, body: { message: "App successfully deleted" } });
    expect(registry.records).toHaveLength(0);
  });

  it("refuses to delete an app with routes", async () => {
    await call("POST", "/v1/p1/apps", { app: { name: "billing" } });
    fake.routes.set("billing-p1", [{ path: "/charge" }, { path: "/refund" }]);

    const res = await call("DELETE", "/v1/p1/apps/billing-p1");
    expect(res).toEqual({ status: 403, body: { error: { message: "Unable to delete app billing-p1 with routes" } } });
    expect(registry.records).toHaveLength(1);
    expect(fake.apps.has("billing-p1")).toBe(true);
  });

  const missingAppCases: Array<["GET" | "PUT" | "DELETE", unknown]> = [
    ["GET", undefined],
    ["PUT", { config: {} }],
    ["DELETE", undefined],
  ];

  it.each(missingAppCases)("answers %s on a missing app with 404 and no remote call", async (method, body) => {
    const res = await call(method, "/v1/p1/apps/ghost-p1", body);

    expect(res).toEqual({ status: 404, body: { error: { message: "App ghost-p1 not found" } } });
    expect(fake.platform.apps.show).not.toHaveBeenCalled();
    expect(fake.platform.apps.update).not.toHaveBeenCalled();
  });

  it("passes the remote status and reason through on get", async () => {
    await call("POST", "/v1/p1/apps", { app: { name: "billing" } });
    fake.platform.apps.show.mockRejectedValueOnce(new FunctionsApiError(410, "App was removed"));

    const res = await call("GET", "/v1/p1/apps/billing-p1");
    expect(res).toEqual({ status: 410, body: { error: { message: "App was removed" } } });
  });

  it("answers a failed remote create with a generic 500", async () => {
    fake.platform.apps.create.mockRejectedValueOnce(new FunctionsApiError(503, "platform unavailable"));

    const res = await call("POST", "/v1/p1/apps", { app: { name: "billing" } });
    expect(res).toEqual({ status: 500, body: { error: { message: "an error occurred, please try again later." } } });
  });

  it("rejects a create body without a name", async () => {
    const res = await call("POST", "/v1/p1/apps", { app: {} });

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: { message: "validation_error", details: [{ field: "app.name" }] } });
  });

  it("rejects malformed JSON", async () => {
    const res = await call("POST", "/v1/p1/apps", "{not json");
    expect(res).toEqual({ status: 400, body: { error: { message: "invalid_json" } } });
  });

  it("answers unknown routes with 404", async () => {
    const res = await call("GET", "/v2/anything");
    expect(res).toEqual({ status: 404, body: { error: { message: "not_found" } } });
  });

  it("reports health", async () => {
    const res = await call("GET", "/v1/health");
    expect(res).toEqual({ status: 200, body: { message: "ok" } });
  });
});
