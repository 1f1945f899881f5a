export { ConsoleTransport, type ConsoleTransportOptions, type ConsoleStream } from "./console.js";
export { FileTransport, type FileTransportOptions } from "./file.js";
