export { httpRequest } from "./httpClient";
export { HttpError } from "./httpError";
