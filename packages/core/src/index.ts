export * from "./types";
export * from "./errors";

export * from "./http/HttpContext";

export * from "./store/Store";
export * from "./store/MemoryStore";

export * from "./cookie/CookieCodec";
export * from "./cookie/CookieSigner";

export * from "./session/SessionCodec";
export * from "./session/SessionManager";

export * from "./SessionJar";
