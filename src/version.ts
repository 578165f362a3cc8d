export const GPU_CONNECT_VERSION = "0.1.0";
