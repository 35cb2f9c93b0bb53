import { Hono } from "hono";

export function createHealthRoutes(storeDriver: string): Hono {
  const routes = new Hono();

  routes.get("/", (c) => c.json({ status: "ok", service: "rate-governor", store: storeDriver }));

  return routes;
}
