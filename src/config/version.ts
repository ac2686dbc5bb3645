/** Version stamped into install records and used as the default image tag. */
export const CLI_VERSION = 'stable-0.1.0';
