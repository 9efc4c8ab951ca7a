import type { ICommentService } from './ICommentService';

const ENCODED_OPEN = /&lt;!--/g;
const ENCODED_CLOSE = /--&gt;/g;
const COMMENT = /<!--[\s\S]*?-->/g;

export class CommentService implements ICommentService {
  stripComments(text: string): string {
    let current = text;
    // Removing one comment can join the halves of another; run to a fixpoint
    for (;;) {
      const next = current
        .replace(ENCODED_OPEN, '<!--')
        .replace(ENCODED_CLOSE, '-->')
        .replace(COMMENT, '');
      if (next === current) {
        return current;
      }
      current = next;
    }
  }
}
