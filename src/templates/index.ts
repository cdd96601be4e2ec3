export {
  renderString,
  renderTemplateFile,
  loadTemplate,
  getTemplatesDir,
  type TemplateValues,
} from "./engine.js";
