/**
 * Web utilities - formatting, validation and rendering
 */

export * from "./format.ts";
export * from "./render.ts";
export * from "./templates.ts";
export * from "./validation.ts";
export * from "./http.ts";
export * from "./mime.ts";
