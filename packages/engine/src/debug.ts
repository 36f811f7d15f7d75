import registerDebug from "debug";

// Enable with DEBUG=tessitura:*
export const debugTree = registerDebug("tessitura:tree");
export const debugIndex = registerDebug("tessitura:index");
