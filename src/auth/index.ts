export * from "./authenticator";
export * from "./loginMarker";
export * from "./loginResponse";
export * from "./redirectFollower";
