/**
 * Preview image selection
 * Numbered images (01.jpg, page2.png) win and are taken in numeric order;
 * without any numbers the first names in lexicographic order are used.
 */
import { entryStem } from './entryPath';

const DIGIT_RUN = /\d+/;

interface NumberedImage {
  path: string;
  number: bigint;
}

export function selectPreviews(images: readonly string[], count: number): string[] {
  if (images.length <= count) {
    return [...images];
  }

  const numbered: NumberedImage[] = [];
  for (const imagePath of images) {
    const match = DIGIT_RUN.exec(entryStem(imagePath));
    if (match) {
      // BigInt keeps long digit runs exact
      numbered.push({ path: imagePath, number: BigInt(match[0]) });
    }
  }

  if (numbered.length > 0) {
    // Array.prototype.sort is stable: equal numbers keep archive order
    numbered.sort((a, b) => (a.number < b.number ? -1 : a.number > b.number ? 1 : 0));
    return numbered.slice(0, Math.max(0, count)).map(image => image.path);
  }

  return [...images].sort().slice(0, Math.max(0, count));
}

export default selectPreviews;
