/**
 * Templates written by `layerkit init`.
 */

export const CONFIG_TEMPLATE = `# layerkit configuration
version: "1.0"

# Rule file (layers, chains, naming, forbidden constructs)
rules: .layerkit/rules.yaml

# Preset used when the rule file is missing
preset: null

files:
  exclude:
    - "**/node_modules/**"
    - "**/dist/**"
    - "**/vendor/**"

features:
  # Operations for entities that list none
  default_operations: [crud]

validation:
  fail_on_warning: false
  exit_codes:
    success: 0
    error: 1
    warning_only: 0

output:
  format: human   # human | json | compact
  colors: true
`;

export const IGNORE_TEMPLATE = `# Files layerkit check skips (gitignore syntax)
node_modules/
dist/
build/
coverage/
**/*.generated.*
`;

export const FEATURES_TEMPLATE = `# Features

- Order (customer orders): create, list, cancel
  - fields: owner:User, total:number, placedAt:datetime
- User (registered accounts): crud
  - fields: email:string, name
`;
