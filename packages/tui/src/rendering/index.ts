export { theme, createTheme, styleInput, formatPromptLine, type Theme } from "./theme.js";
