/**
 * Constantes UI configurables via variables d'environnement
 */

// Durée d'affichage du toast d'erreur (ms)
export const TOAST_DURATION_MS = Number(import.meta.env.VITE_UI_TOAST_MS) || 4000;
