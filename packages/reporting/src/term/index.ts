export * from "./config";
export * from "./display-list";
export * from "./emit";
export { Resolver, groupLabels, outerPadding, richEntries, shortEntries } from "./layout";
export { Renderer } from "./renderer";
export * from "./sink";
