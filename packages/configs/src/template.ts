/**
 * Header for files we generate so nobody edits them by hand.
 */
export const TEMPLATE_WARNING = `# THIS FILE HAS BEEN GENERATED BY THE CONFIGS REPO
# AND SHOULD NEVER BE EDITED BY HAND!!
# Instead change the link in configs/links.toml

`;

export function renderGenerated(body: string): string {
  return TEMPLATE_WARNING + body;
}
