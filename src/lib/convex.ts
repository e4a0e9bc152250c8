import { ConvexHttpClient } from "convex/browser";

export type ConvexCaller = Pick<ConvexHttpClient, "query" | "mutation">;

export const makeConvex = (url: string): ConvexCaller => new ConvexHttpClient(url);
