export { healthRoutes, getRootVersion } from "./routes.js";
