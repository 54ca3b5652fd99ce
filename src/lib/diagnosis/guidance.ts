export interface ErrorGuidance {
  title: string;
  suggestion: string;
}

/** Maps a diagnosis error message to a headline and a next step for the user. */
export function getErrorGuidance(error: string): ErrorGuidance {
  if (error.includes('not configured') || error.includes('GOOGLE_MAPS_API_KEY'))
    return { title: 'Service Not Configured', suggestion: 'The server is missing its Google Maps credentials.' };
  if (error.includes('Could not find'))
    return { title: 'Restaurant Not Found', suggestion: 'Try the exact name plus the city, or paste the full street address.' };
  if (error.includes('timeout') || error.includes('abort'))
    return { title: 'Request Timed Out', suggestion: 'One of the data sources took too long to respond. Try again in a minute.' };
  if (error.includes('valid URL'))
    return { title: 'Invalid Delivery URL', suggestion: 'Paste the full storefront link, starting with https://.' };
  return { title: 'Diagnosis Failed', suggestion: 'Something went wrong. Try again or try a different search.' };
}
