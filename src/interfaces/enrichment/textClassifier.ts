/**
 * TextClassifier interface: maps a posting to a category label
 */

import type { Category } from "@/types";

export interface TextClassifier {
  /**
   * Classify a posting from its title and (optional) description
   *
   * Implementations are deterministic and side-effect free.
   */
  classify(title: string, description?: string): Category;
}
