export const UNSPECIFIED = 'Non spécifié';

const CONTRACT_KEYWORDS: ReadonlyArray<[string, readonly string[]]> = [
  ['CDI', ['cdi', 'contrat à durée indéterminée', 'permanent', 'indéterminée']],
  ['CDD', ['cdd', 'contrat à durée déterminée', 'déterminée', 'temporaire']],
  ['Alternance', ['altern', 'apprentissage', 'apprenti', 'contrat pro', 'professionnalisation']],
  ['Stage', ['stage', 'stagiaire', 'internship', 'intern']],
  ['Freelance', ['freelance', 'indépendant', 'consultant externe', 'auto-entrepreneur']],
  ['Intérim', ['intérim', 'mission temporaire', "mission d'intérim"]],
  ['Temps partiel', ['temps partiel', 'mi-temps', 'part-time']],
  ['Temps plein', ['temps plein', 'temps complet', 'full-time']],
];

export interface ContractInfo {
  contractType: string;
  detected: string[];
  isApprenticeship: boolean;
}

/**
 * Keyword classification over title and text. When both CDI and CDD appear, the
 * one mentioned first wins; otherwise table order decides.
 */
export function identifyContractType(title: string, text: string): ContractInfo {
  const haystack = `${title} ${text}`.toLowerCase();
  const detected = CONTRACT_KEYWORDS.filter(([, keywords]) => keywords.some((k) => haystack.includes(k))).map(
    ([type]) => type,
  );

  let contractType = detected[0] ?? UNSPECIFIED;
  if (detected.includes('CDI') && detected.includes('CDD')) {
    contractType = haystack.split('cdd')[0].includes('cdi') ? 'CDI' : 'CDD';
  }

  return { contractType, detected, isApprenticeship: detected.includes('Alternance') };
}

export function mentionsApprenticeship(text: string): boolean {
  const lowered = text.toLowerCase();
  return lowered.includes('altern') || lowered.includes('apprentissage');
}

export function matchesContract(filter: string, contractType: string, isApprenticeship: boolean): boolean {
  const wanted = filter.toLowerCase();
  if (contractType.toLowerCase().includes(wanted)) return true;
  return wanted.includes('altern') && isApprenticeship;
}
