export { createLoggingNotifier } from "./loggingNotifier";
