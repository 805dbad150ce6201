export { JsonLinesAdapter, type JsonLinesAdapterConfig } from "./JsonLinesAdapter";
