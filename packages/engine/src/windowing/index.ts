export { createDefaultWindow, adjustBound, extractNormalized } from "./Windowing";
