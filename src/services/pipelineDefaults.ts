import { PipelineSettings } from './settingsTypes';

export const DEFAULT_ENDPOINTS_TO_KEEP = [
    '/v2/attachments/{attachment_id}/get',
    '/v2/attachments/get',
    '/v2/audio.json/get',
    '/v2/audio/{audio_id}.mp4/get',
    '/v2/photos.json/get',
    '/v2/photos/{photo_id}.jpg/get',
    '/v2/photos/{photo_id}.json/get',
    '/v2/query/post',
    '/v2/records.json/get',
    '/v2/records.json/post',
    '/v2/records/{record_id}.json/delete',
    '/v2/records/{record_id}.json/get',
    '/v2/records/{record_id}.json/patch',
    '/v2/records/{record_id}.json/put',
    '/v2/records/{record_id}/history.json/get',
    '/v2/reports.json/post',
    '/v2/reports/{report_id}.pdf/get',
    '/v2/signatures.json/get',
    '/v2/signatures/{signature_id}.json/get',
    '/v2/signatures/{signature_id}.png/get',
    '/v2/videos.json/get',
    '/v2/videos/{video_id}.mp4/get',
    '/v2/webhooks.json/post',
    '/v2/webhooks/{webhook_id}.json/delete'
];

export const DEFAULT_EVENT_TYPES = [
    'record.create', 'record.update', 'record.delete',
    'form.create', 'form.update', 'form.delete',
    'choice_list.create', 'choice_list.update', 'choice_list.delete',
    'classification_set.create', 'classification_set.update', 'classification_set.delete'
];

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
    endpointsToKeep: DEFAULT_ENDPOINTS_TO_KEEP,
    info: {
        restrictedTitleWords: ['api', 'connector'],
        minDescriptionLength: 30,
        defaultDescription: "Fulcrum is a mobile data collection platform for field teams. This connector enables integration with Fulcrum's API for managing field data, photos, videos, and more.",
        defaultContact: {
            name: 'Fulcrum Support',
            url: 'https://www.fulcrumapp.com/support',
            email: 'support@fulcrumapp.com'
        },
        connectorMetadata: [
            { propertyName: 'Website', propertyValue: 'https://www.fulcrumapp.com' },
            { propertyName: 'Privacy policy', propertyValue: 'https://www.fulcrumapp.com/privacy' },
            { propertyName: 'Categories', propertyValue: 'Productivity;Data' }
        ]
    },
    webhook: {
        registrationPath: '/v2/webhooks.json',
        deletePath: '/v2/webhooks/{webhook_id}.json',
        requestModel: 'WebhookRequest',
        payloadModel: 'FulcrumWebhookPayload',
        callbackParameterNames: ['url', 'callback_url', 'webhook_url'],
        triggerOperationId: 'OnFulcrumEvent',
        triggerSummary: 'When a Fulcrum event occurs',
        triggerDescription: 'Triggers when a Fulcrum resource is created, updated, or deleted. ' +
            'Supports events for records, forms, choice lists, and classification sets. ' +
            'Configure the webhook in your Fulcrum organization to specify which events to monitor.',
        triggerHint: 'To see it work, create, update, or delete a record, form, choice list, or classification set in Fulcrum',
        deleteOperationId: 'UnsubscribeFromFulcrumEvent',
        defaultWebhookName: 'Power Platform Trigger',
        payloadDescription: 'Webhook event payload from Fulcrum',
        eventTypes: DEFAULT_EVENT_TYPES
    }
};
