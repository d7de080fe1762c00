const BANNER = `
  ╔╦╗╔═╗╔═╗╔═╗╦ ╦
   ║║║╣ ║  ║ ║╚╦╝
  ═╩╝╚═╝╚═╝╚═╝ ╩
`;

const TAGLINES = [
  "Keep them talking.",
  "Every minute on the line is a minute saved.",
  "Patience is the bait.",
  "Sorry sir, network issue.",
];

export function printBanner(version: string): void {
  const tagline = TAGLINES[Math.floor(Math.random() * TAGLINES.length)];
  console.log(BANNER);
  console.log(`  v${version}: ${tagline}\n`);
}
