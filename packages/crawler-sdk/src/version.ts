export const SDK_VERSION = "0.1.0";
export const USER_AGENT = `crawlerverse-ts/${SDK_VERSION}`;
