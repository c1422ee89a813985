export { ConsoleTransport, type ConsoleTransportOptions } from "./console.js"
