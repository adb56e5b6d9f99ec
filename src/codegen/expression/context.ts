import { CodeGenerationContext } from "../context.js";
import type { ExpressionNode } from "./nodes.js";

export class ExpressionContext extends CodeGenerationContext<ExpressionNode> {
  private labels = 0;

  nextLabel(): string {
    this.labels += 1;
    return `END_FOREACH_${this.labels}`;
  }
}
