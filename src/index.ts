export * from "./types/font.types";
export * from "./types/resolver.types";
export * from "./engine/style/fontStyle";
export * from "./engine/selectors/FamilySelector";
export * from "./engine/resolvers/StyleResolver";
export * from "./engine/parsers/StyleReader";
export * from "./engine/validation";
export { engineLogger } from "./engine/logger";
export * from "./stores/defaultIdentityStore";
export * from "./lib/families";
export * from "./config/engineConfig";
