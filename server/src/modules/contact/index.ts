export { contactRoutes, type ContactRoutesOptions } from "./routes.js";
