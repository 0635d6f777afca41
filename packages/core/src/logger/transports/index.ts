export { ConsoleTransport, type ConsoleTransportOptions } from "./console.js";
export { JsonTransport, type JsonTransportOptions } from "./json.js";
