import { emptySummary, type Intent, type Locale, type StatusSummary } from './types';

/** Only the first identifiers are shown; the summary keeps the full list. */
export const MAX_LISTED_SENSORS = 10;

type Rendering = Record<Locale, string>;

function checkConnectivity(disconnected: number): Rendering {
  if (disconnected === 0) {
    return {
      fr: 'Oui, tous les capteurs sont connectés.',
      en: 'Yes, all sensors are connected.',
    };
  }
  return {
    fr: `Non, ${disconnected} capteurs sont déconnectés.`,
    en: `No, ${disconnected} sensors are disconnected.`,
  };
}

function listDisconnected(summary: StatusSummary): Rendering {
  if (summary.disconnectedCount === 0) {
    return {
      fr: "Aucun capteur n'est déconnecté.",
      en: 'No disconnected sensors.',
    };
  }
  const listed = summary.disconnectedIds.slice(0, MAX_LISTED_SENSORS).join(', ');
  return {
    fr: `Capteurs déconnectés : ${listed}`,
    en: `Disconnected sensors: ${listed}`,
  };
}

const CLARIFICATION: Rendering = {
  fr: "Je n'ai pas compris la question. Essayez par ex. : 'Tous les capteurs sont-ils connectés ?'",
  en: "I didn't understand the question. Try for instance: 'Are all sensors connected?'",
};

export function composeAnswer(
  intent: Intent,
  summary: StatusSummary | undefined,
  locale: Locale,
): string {
  const status = summary ?? emptySummary();
  switch (intent) {
    case 'check_connectivity':
      return checkConnectivity(status.disconnectedCount)[locale];
    case 'list_disconnected':
      return listDisconnected(status)[locale];
    case 'unknown':
      return CLARIFICATION[locale];
  }
}
