export { BufferedIO, createProcessIO, type HostIO } from "./host_io";
export { createStandardLibrary, makeNativeFunction, parseNumber } from "./standard_library";
