/**
 * Copy-paste shell commands for creating, updating and deleting a stack by hand.
 *
 * The legacy create payload uses capitalized keys (Name, StackFileContent, Env)
 * while the update payload uses lower-case keys (stackFileContent, env, prune,
 * pullImage). Keep both: which casing a server accepts is what this tool reports.
 */

import { ProbeConfig } from '../config';

/** Stand-in shown when no STACK_ID was configured */
const STACK_ID_PLACEHOLDER = '123';

/**
 * Renders the manual command block. Pure: the same config yields the same text.
 */
export function renderManualCommands(config: ProbeConfig): string {
    const baseUrl = config.portainer.url;
    const { endpointId, stackName, stackFile } = config.stack;
    const stackId = config.stack.stackId ?? STACK_ID_PLACEHOLDER;

    return String.raw`# 0) Common headers
export PORTAINER_URL='${baseUrl}'
export PORTAINER_ENDPOINT_ID='${endpointId}'
export STACK_NAME='${stackName}'
export STACK_FILE='${stackFile}'

# 1) List stacks
curl -sS -H "X-API-Key: $PORTAINER_API_KEY" "$PORTAINER_URL/api/stacks" | jq .

# 2) Create stack payload
#    Payload keys (commonly accepted): Name, StackFileContent, Env
payload_old_create=$(jq -n \
  --arg name "$STACK_NAME" \
  --arg content "$(cat "$STACK_FILE")" \
  --argjson env '{}' \
  '{Name: $name, StackFileContent: $content, Env: ($env | to_entries | map({name: .key, value: .value}))}'
)

# 3) NEW create (Portainer 2.33+ common)
curl -sS -i -X POST \
  -H "X-API-Key: $PORTAINER_API_KEY" \
  -H "Content-Type: application/json" \
  "$PORTAINER_URL/api/stacks/create/standalone/string?endpointId=$PORTAINER_ENDPOINT_ID" \
  -d "$payload_old_create"

# 4) OLD create (legacy; may return 405 on newer Portainer)
curl -sS -i -X POST \
  -H "X-API-Key: $PORTAINER_API_KEY" \
  -H "Content-Type: application/json" \
  "$PORTAINER_URL/api/stacks?type=2&method=string&endpointId=$PORTAINER_ENDPOINT_ID" \
  -d "$payload_old_create"

# 5) Update payload
#    Endpoint: PUT /api/stacks/{id}?endpointId=...
#    Payload keys (note lowercase): stackFileContent, env, prune, pullImage
payload_update=$(jq -n \
  --arg content "$(cat "$STACK_FILE")" \
  --argjson env '{}' \
  --argjson prune true \
  '{stackFileContent: $content, env: ($env | to_entries | map({name: .key, value: .value})), prune: $prune, pullImage: true}'
)

# Replace STACK_ID with the one from step (1)
STACK_ID=${stackId}
curl -sS -i -X PUT \
  -H "X-API-Key: $PORTAINER_API_KEY" \
  -H "Content-Type: application/json" \
  "$PORTAINER_URL/api/stacks/$STACK_ID?endpointId=$PORTAINER_ENDPOINT_ID" \
  -d "$payload_update"

# 6) Delete stack (DESTRUCTIVE)
#    Some Portainer setups require external=true (depends how the stack was created).
STACK_ID=${stackId}
curl -sS -i -X DELETE \
  -H "X-API-Key: $PORTAINER_API_KEY" \
  "$PORTAINER_URL/api/stacks/$STACK_ID?endpointId=$PORTAINER_ENDPOINT_ID"

STACK_ID=${stackId}
curl -sS -i -X DELETE \
  -H "X-API-Key: $PORTAINER_API_KEY" \
  "$PORTAINER_URL/api/stacks/$STACK_ID?endpointId=$PORTAINER_ENDPOINT_ID&external=true"

# 7) Other create candidates (varies by version)
#    Check the swagger output above to confirm the exact route and params on YOUR instance.
#    (a) POST /api/stacks/create/standalone/string?endpointId=...  (see step 3)
#    (b) POST /api/stacks/create/standalone/file?endpointId=...  (multipart) — use swagger to confirm it exists.
`;
}
