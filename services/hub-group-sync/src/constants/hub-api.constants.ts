export const HUB_PAGINATION_MEDIA_TYPE = 'application/jupyterhub-pagination+json' as const;
