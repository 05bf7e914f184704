/** Package version, sent in the User-Agent header. */
export const CLIENT_VERSION = '0.4.0';

export const USER_AGENT = `realtime-session-client/${CLIENT_VERSION}`;
