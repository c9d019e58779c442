export { createDomRenderer, type DomRenderer, type DomRendererOptions } from "./dom-renderer.js";
export { createDialogModalHost, type DialogModalHost, type DialogModalDefaults } from "./dialog-modal-host.js";
export { bindViewLink, type ViewLinkOptions } from "./view-link.js";
export { toNodes, type DomOutput } from "./nodes.js";
