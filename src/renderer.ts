import { marked } from 'marked';
import { BuildContext } from './build-context.js';
import { expandMarkers } from './markers.js';

/**
 * Options for rendering narrative markdown
 */
export interface RenderOptions {
  /** Leave {% lod %} markers unexpanded (for testing) */
  disableMarkers?: boolean;
}

/**
 * Create a configured marked instance
 */
function createMarkedInstance(): typeof marked {
  marked.setOptions({
    gfm: true,       // GitHub Flavored Markdown
    breaks: false,   // Narrative paragraphs wrap freely
  });

  return marked;
}

/**
 * Render a narrative document's markdown to HTML, expanding entity markers
 * into links first.
 */
export function renderNarrative(markdown: string, context: BuildContext, options: RenderOptions = {}): string {
  const markedInstance = createMarkedInstance();

  const preprocessed = options.disableMarkers ? markdown : expandMarkers(markdown, context);

  return markedInstance.parse(preprocessed) as string;
}
