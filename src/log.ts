import Debug from "debug";

export const NAMESPACE = "eui48-mac";

export const parseLog = Debug(`${NAMESPACE}:parse`);
