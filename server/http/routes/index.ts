import type { RouteContext, RouteFactory, RouteHandler } from "../types.js";
import { createEventRoutes } from "./events.routes.js";
import { createHealthRoutes } from "./health.routes.js";
import { createLogRoutes } from "./logs.routes.js";
import { createPtyRoutes } from "./pty.routes.js";

const routeFactories: RouteFactory[] = [
  createHealthRoutes,
  createPtyRoutes,
  createEventRoutes,
  createLogRoutes,
];

export function createAllRoutes(ctx: RouteContext): RouteHandler[] {
  return routeFactories.flatMap((factory) => factory(ctx));
}
