export const P2_VERSION = "0.1.0";
