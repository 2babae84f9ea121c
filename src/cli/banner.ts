const BANNER = `
  ╦ ╦╔═╗╦═╗╔╦╗╔═╗╔╗╔
  ║║║╠═╣╠╦╝ ║║║╣ ║║║
  ╚╩╝╩ ╩╩╚══╩╝╚═╝╝╚╝
`;

const TAGLINES = [
  "Every message, accounted for.",
  "Keeping the door, politely.",
  "Patience has a threshold.",
];

export function printBanner(version: string): void {
  const tagline = TAGLINES[Math.floor(Math.random() * TAGLINES.length)];
  console.log(BANNER);
  console.log(`  v${version}  ${tagline}\n`);
}
