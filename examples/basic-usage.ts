import { assembleDocument, bbox, formatDocument, renderMarkdown } from '../src';
import type { AssemblyPage } from '../src';

/**
 * Basic usage example for the layout assembler
 */
function main() {
  // 1. Mock detector output (usually from an OCR model and a layout model)
  const pages: AssemblyPage[] = [
    {
      dimensions: { width: 600, height: 800 },
      regions: [
        { id: 'region-title', label: 'title', bbox: bbox(40, 30, 560, 70) },
        { id: 'region-body', label: 'text', bbox: bbox(40, 90, 560, 200) },
        { id: 'region-chart', label: 'picture', bbox: bbox(40, 220, 560, 500) },
      ],
      lines: [
        { text: 'Harbor Report', words: [bbox(50, 40, 150, 60), bbox(160, 40, 240, 60)] },
        { text: 'Arrivals were up this month', words: [bbox(50, 100, 320, 112)] },
        { text: 'while departures held flat', words: [bbox(50, 116, 300, 128)] },
        { text: 'page 1', words: [bbox(280, 760, 330, 772)] },
      ],
    },
  ];

  // 2. Assemble into a reading-ordered document
  const doc = assembleDocument(pages, { detectionOrigin: 'example' });

  // 3. Inspect the blocks
  console.log('--- Blocks ---');
  console.log(formatDocument(doc));

  console.log('\n--- Markdown ---');
  console.log(renderMarkdown(doc));
}

main();
