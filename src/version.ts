export const TOOL_NAME = 'fmu-md';
export const VERSION = '0.1.0';
