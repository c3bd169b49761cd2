export * from "./message_renderer";
