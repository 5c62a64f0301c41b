/**
 * Starter files written by `promptloom init`.
 */

export const EXAMPLE_CONFIG = `# promptloom configuration
promptloom:
  # Directory holding persona/, action/, example/, variant/ and templates/
  root: promptloom

generate:
  # Naming convention: standard, copilot or claude-code
  tool: standard
  # Optional library namespace, e.g. used as a filename prefix by copilot
  library: null
  output_dir: prompts

# Metadata available to every template as {{metadata.<key>}}
metadata: {}

prompts:
  - persona: researcher
    action: analyze
    examples:
      - analysis-output
    # Variants render from action/{variant}-analyze.md.hbs when present,
    # otherwise they are generated with an AI CLI tool (codex, gh copilot, claude, gemini)
    variants:
      - update
    metadata:
      description: Analyze a topic and report findings
`;

export const EXAMPLE_PERSONA = `You are a meticulous researcher. You gather evidence before drawing conclusions,
cite your sources, and state uncertainty plainly.
`;

export const EXAMPLE_ACTION = `{{frontmatter metadata}}
{{persona}}

## Task

Analyze {{default metadata.topic "the topic you are given"}} and summarize what you find.
{{#if examples}}

## Examples
{{#each examples}}

{{this}}
{{/each}}
{{/if}}
`;

export const EXAMPLE_EXAMPLE = `### Analysis

- **Finding**: one sentence stating the observation
- **Evidence**: where it comes from
- **Confidence**: high, medium or low
`;

export const EXAMPLE_VARIANT = `Rewrite the prompt below so that it asks to update an existing {{action_name}} result
instead of starting from scratch. Keep the persona and output format. Reply with the prompt only.
`;

export const TEMPLATES_README = `# Partials

Files ending in \`.hbs\` in this directory are registered as Handlebars partials under
their file name, e.g. \`footer.hbs\` is included with \`{{> footer}}\`.
`;

export const OUTPUT_GITIGNORE = `# Generated by promptloom
*
!.gitignore
`;
