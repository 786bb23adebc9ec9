/**
 * Classifier constants: keyword lists, margins, training data location
 *
 * Matching is case-insensitive substring matching, except that keywords of
 * three alphanumeric characters or fewer ("rf", "ai", "ios") must appear as
 * a whole token so that e.g. "interface" does not count as "rf".
 */

/**
 * Keywords that mark a posting as hardware. Checked first, on the title.
 */
export const HARDWARE_KEYWORDS: readonly string[] = [
  "hardware",
  "electrical",
  "electronics",
  "electronic",
  "circuit",
  "pcb",
  "fpga",
  "embedded",
  "firmware",
  "asic",
  "rf",
  "analog",
  "signal",
  "systems engineer",
  "power electronics",
  "digital design",
  "silicon",
  "semiconductor",
  "board",
  "vlsi",
  "soc",
  "verification",
  "verilog",
  "vhdl",
  "hdl",
  "processor",
  "microcontroller",
  "schematic",
  "layout",
  "chip",
];

/**
 * Keywords that mark a posting as software. Checked on the title after the
 * hardware list has missed.
 */
export const SOFTWARE_KEYWORDS: readonly string[] = [
  "software",
  "web",
  "webdev",
  "frontend",
  "front-end",
  "backend",
  "back-end",
  "fullstack",
  "full-stack",
  "full stack",
  "javascript",
  "typescript",
  "python",
  "java",
  "c++",
  "golang",
  "ruby",
  "react",
  "node",
  "django",
  "flask",
  "app",
  "mobile",
  "ios",
  "android",
  "cloud",
  "devops",
  "ml",
  "ai",
  "machine learning",
  "data scientist",
  "data science",
  "algorithm",
  "coding",
  "programmer",
  "development",
  "developer",
  "database",
  "sql",
  "nosql",
  "api",
  "aws",
  "azure",
  "gcp",
  "saas",
];

/**
 * Description rule: hardware wins only when its distinct-keyword count
 * exceeds the software count by more than this margin.
 */
export const DESCRIPTION_HARDWARE_MARGIN = 1;

/**
 * Laplace smoothing for the naive Bayes fallback model
 */
export const NAIVE_BAYES_ALPHA = 1;

/**
 * Path to the curated, labeled training titles (relative to cwd)
 */
export const TRAINING_SET_PATH = "data/classifier-training.json";
