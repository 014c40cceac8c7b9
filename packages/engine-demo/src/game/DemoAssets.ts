import type { AppliedManifest, ResourceHandle, TemplateId } from '@pixelhold/engine-core';

/** Name lookups over what the manifest loaded; unknown names are a data bug. */
export class DemoAssets {
    constructor(private readonly applied: AppliedManifest) {}

    resource(name: string): ResourceHandle {
        const handle = this.applied.resources.get(name);
        if (handle === undefined) throw new Error(`Manifest has no resource '${name}'`);
        return handle;
    }

    template(name: string): TemplateId {
        const id = this.applied.templates.get(name);
        if (id === undefined) throw new Error(`Manifest has no template '${name}'`);
        return id;
    }
}
