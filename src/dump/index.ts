export { DumpConfig, DEFAULT_DUMP_OPTIONS, MAX_BYTE_GROUP_LENGTH, MAX_LINE_WIDTH, type DumpOptions } from "./config";
export { Dumper, type LineSink } from "./dumper";
export { InvalidConfigurationError, SourceReadError } from "./errors";
export { formatByteChar, formatHeader, formatLine, hexFieldWidth } from "./format";
export { FileSource, MemorySource, type ByteSource } from "./source";
