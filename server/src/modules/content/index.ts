export { contentRoutes, type ContentRoutesOptions } from "./routes.js";
