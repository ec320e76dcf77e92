export { uploadRoutes, type UploadRoutesOptions } from "./routes.js";
