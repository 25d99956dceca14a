export * from "./features/climbs";
