export * from './smtp-mailer';
export * from './recording-mailer';
