export type ProfileField = [label: string, value: string];

/** Minimal profile page with the markup the extractor reads. */
export function profilePage(fields: ProfileField[], seedingHeaders: string[] = []): string {
  const rows = fields
    .map(([label, value]) => `<div class="profil_jobb_elso2">${label}</div><div class="profil_jobb_masodik2">${value}</div>`)
    .join('\n');
  const headers = seedingHeaders.map((text) => `<div class="lista_mini_fej">${text}</div>`).join('\n');

  return `<!DOCTYPE html>
<html>
  <head><title>Profil</title></head>
  <body>
    <div class="userbox_tartalom_mini">
      ${rows}
    </div>
    ${headers}
  </body>
</html>`;
}

export const FULL_PROFILE: ProfileField[] = [
  ['Helyezés:', '42.'],
  ['Feltöltés:', '12.34 TiB'],
  ['Aktuális feltöltés:', '1.50 GiB'],
  ['Aktuális letöltés:', '300.00 MiB'],
  ['Pontok száma:', '1 234 567'],
];
