/**
 * Exchange file constants
 */

export const DEFAULT_EXTRACTION_OUTPUT = "translateables.json";
export const DEFAULT_TEMPLATE_EXTRACTION_OUTPUT = "translateables_html.json";

/**
 * Preview lengths used in progress lines.
 */
export const PREVIEW_LENGTH = 50;
export const PLURAL_PREVIEW_LENGTH = 40;
export const PLURAL_FORM_PREVIEW_LENGTH = 30;
